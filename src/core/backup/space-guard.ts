/**
 * Free-space guard for the backup destination
 */

import { statfs } from "node:fs/promises";
import { getErrorMessage } from "../../utils/errors";

/** Free space, in KB, of the filesystem holding a path */
export type FreeSpaceQuery = (path: string) => Promise<number>;

export type SpaceCheck =
  | { ok: true; freeKB: number }
  | { ok: false; freeKB: number | null; reason: string };

/**
 * Space available to unprivileged users, the figure `df -P` reports
 */
export async function statfsFreeKB(path: string): Promise<number> {
  const stats = await statfs(path);
  return Math.floor((stats.bavail * stats.bsize) / 1024);
}

/**
 * Compare free space against a threshold. Exactly the threshold is enough.
 * A failing query is reported as insufficient rather than thrown.
 */
export async function checkFreeSpace(
  path: string,
  thresholdKB: number,
  query: FreeSpaceQuery = statfsFreeKB,
): Promise<SpaceCheck> {
  let freeKB: number;
  try {
    freeKB = await query(path);
  } catch (error) {
    return { ok: false, freeKB: null, reason: `Unable to read free space: ${getErrorMessage(error)}` };
  }

  if (freeKB < thresholdKB) {
    return {
      ok: false,
      freeKB,
      reason: `Insufficient free space: ${freeKB} KB available, ${thresholdKB} KB required`,
    };
  }

  return { ok: true, freeKB };
}
