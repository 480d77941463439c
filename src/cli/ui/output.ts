/**
 * Styled output helpers
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import pkg from "../../../package.json";

export { color };

export const VERSION = pkg.version;

/**
 * Display the tierback banner with version and the running command
 */
export function banner(command: string): void {
  p.intro(`${color.cyan("tierback")} ${color.dim(`v${VERSION}`)} ${color.dim("·")} ${color.white(command)}`);
}

export const info = (message: string) => p.log.info(message);
export const success = (message: string) => p.log.success(message);
export const error = (message: string) => p.log.error(message);
