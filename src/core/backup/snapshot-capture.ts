/**
 * Snapshot capture: copy every source tree into the cycle's staging directory
 */

import { mkdir, stat } from "node:fs/promises";
import * as path from "node:path";
import type { CaptureFailure, CaptureReport, SourceSpec } from "../../types";
import { getErrorMessage } from "../../utils/errors";
import { CommandError, type CommandRunner, runCommand } from "../../utils/exec";
import { logger } from "../../utils/logger";
import { ensureTrailingSep } from "../../utils/path";

/** Copy one source tree into `destDir`, skipping files above the size cap */
export type CopyFn = (source: SourceSpec, destDir: string) => Promise<void>;

export interface CaptureTarget {
  source: SourceSpec;
  destDir: string;
}

/**
 * `rsync -a --max-size` copy of the source's contents. Exit codes 23 and 24
 * (partial transfer) are reported as failures like any other.
 */
export async function rsyncCopy(
  source: SourceSpec,
  destDir: string,
  run: CommandRunner = runCommand,
): Promise<void> {
  const result = await run("rsync", [
    "-a",
    `--max-size=${source.maxFileSizeBytes}`,
    ensureTrailingSep(source.path),
    destDir,
  ]);

  if (!result.success) {
    throw new CommandError("rsync", result);
  }
}

/**
 * Give every source its own subdirectory named after its base name;
 * repeated base names get a numeric suffix.
 */
export function resolveCaptureTargets(sources: readonly SourceSpec[], stagingDir: string): CaptureTarget[] {
  const used = new Map<string, number>();

  return sources.map((source) => {
    const base = path.basename(path.resolve(source.path)) || "root";
    const seen = used.get(base) ?? 0;
    used.set(base, seen + 1);

    const dirName = seen === 0 ? base : `${base}-${seen + 1}`;
    return { source, destDir: path.join(stagingDir, dirName) };
  });
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Copy all sources in parallel and wait for every one of them. A failed
 * source is logged and reported; it never fails the capture as a whole.
 */
export async function captureSnapshot(
  sources: readonly SourceSpec[],
  stagingDir: string,
  copy: CopyFn = rsyncCopy,
): Promise<CaptureReport> {
  const targets = resolveCaptureTargets(sources, stagingDir);

  const results = await Promise.allSettled(
    targets.map(async ({ source, destDir }) => {
      if (!(await isDirectory(source.path))) {
        throw new Error(`Source path does not exist: ${source.path}`);
      }
      await mkdir(destDir, { recursive: true });
      await copy(source, destDir);
    }),
  );

  const copied: string[] = [];
  const failed: CaptureFailure[] = [];

  results.forEach((result, index) => {
    const sourcePath = targets[index]?.source.path ?? "";
    if (result.status === "fulfilled") {
      copied.push(sourcePath);
      logger.debug(`Copied ${sourcePath}`);
    } else {
      const error = getErrorMessage(result.reason);
      failed.push({ path: sourcePath, error });
      logger.warn(`Copy failed for ${sourcePath}: ${error}`);
    }
  });

  return { copied, failed };
}
