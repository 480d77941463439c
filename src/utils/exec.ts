/**
 * External command runner built on execa
 */

import { execa } from "execa";
import { logger } from "./logger";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Signature shared by every collaborator that shells out, so tests can
 * substitute an in-process fake.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export class CommandError extends Error {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, result: CommandResult) {
    const detail = result.stderr || result.stdout || "no output";
    super(`${command} exited with code ${result.exitCode}: ${detail}`);
    this.name = "CommandError";
    this.exitCode = result.exitCode;
    this.stderr = result.stderr;
  }
}

/**
 * Run a command and return the result. Never throws for a non-zero exit;
 * a command that cannot be spawned reports exit code -1.
 */
export const runCommand: CommandRunner = async (command, args) => {
  logger.debug(`$ ${command} ${args.join(" ")}`);

  const result = await execa(command, args, { reject: false });
  const exitCode = result.exitCode ?? -1;
  const stderr = result.stderr.trim();

  return {
    success: !result.failed && exitCode === 0,
    stdout: result.stdout.trim(),
    stderr: stderr || (exitCode === -1 ? `unable to run ${command}` : ""),
    exitCode,
  };
};
