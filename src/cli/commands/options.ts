/**
 * Options shared by the daemon commands
 */

import {
  extractInlineOptions,
  findAndLoadConfig,
  hasInlineOptions,
  type InlineArgValues,
  INLINE_CONFIG_OPTIONS,
} from "../../config";
import type { DaemonConfig } from "../../types";
import { logger } from "../../utils";

export const DAEMON_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
  // Inline config options
  ...INLINE_CONFIG_OPTIONS,
};

export interface DaemonArgValues extends InlineArgValues {
  config?: string;
}

export async function loadCommandConfig(values: DaemonArgValues): Promise<DaemonConfig> {
  const inline = extractInlineOptions(values);
  if (hasInlineOptions(inline)) {
    logger.debug("Command-line options override the config file");
  }
  return findAndLoadConfig(values.config, inline);
}

export const INLINE_OPTIONS_HELP = `  -c, --config <path>          Path to config file (default: ./tierback.config.yaml)
      --source <path>          Source directory to back up (can be repeated)
      --dest <path>            Destination root (default: ~/.backups)
      --store <kind>           directory | container (default: directory)
      --interval <seconds>     Seconds between backups (default: 600)
      --max-file-size <size>   Skip files larger than this (default: 10M)
  -v, --verbose                Verbose output
  -h, --help                   Show this help message`;
