/**
 * Pack a staged snapshot into a single archive with tar
 */

import type { ArchiveFormat } from "../../types";
import { CommandError, type CommandRunner, runCommand } from "../../utils/exec";
import { logger } from "../../utils/logger";
import { ArchiveWriteError } from "../../storage/errors";

export type PackFn = (sourceDir: string, outputPath: string, format: ArchiveFormat) => Promise<void>;

/**
 * Archive the contents of `sourceDir` into `outputPath`, gzipped for the
 * directory store and plain tar for container entries.
 */
export async function packDirectory(
  sourceDir: string,
  outputPath: string,
  format: ArchiveFormat,
  run: CommandRunner = runCommand,
): Promise<void> {
  logger.debug(`Creating ${format} archive: ${outputPath}`);

  const mode = format === "tgz" ? "-czf" : "-cf";
  const result = await run("tar", [mode, outputPath, "-C", sourceDir, "."]);

  if (!result.success) {
    throw new ArchiveWriteError(`Failed to create archive ${outputPath}`, {
      cause: new CommandError("tar", result),
    });
  }
}
