/**
 * Exclusive per-destination lock file
 *
 * `<dest>/.tierback.lock` holds the pid of the daemon that owns the
 * destination. It is created with O_EXCL; a lock whose pid is no longer
 * alive, or is our own, is stale and taken over.
 */

import { open, readFile, rm } from "node:fs/promises";
import * as path from "node:path";
import { isNodeError, isNotFoundError } from "../../utils/path";

export const LOCK_FILE_NAME = ".tierback.lock";

export type ProcessProbe = (pid: number) => boolean;

export interface InstanceLock {
  readonly path: string;
  readonly pid: number;
  release(): Promise<void>;
}

export type LockResult =
  | { acquired: true; lock: InstanceLock }
  | { acquired: false; holderPid: number };

export function lockPathFor(destination: string): string {
  return path.join(destination, LOCK_FILE_NAME);
}

/**
 * Signal 0 probes a pid without delivering anything. EPERM means the
 * process exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return isNodeError(error) && error.code === "EPERM";
  }
}

async function readPid(lockPath: string): Promise<number | null> {
  try {
    const pid = Number.parseInt((await readFile(lockPath, "utf8")).trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (error) {
    if (isNotFoundError(error)) return null;
    throw error;
  }
}

/**
 * A lock naming our own pid was left by an earlier incarnation of this
 * process (pid reuse, or pid 1 in a container), never by a rival.
 */
function isLiveRival(holderPid: number, self: number, isAlive: ProcessProbe): boolean {
  return holderPid !== self && isAlive(holderPid);
}

/**
 * Pid of the live daemon holding the destination, if any
 */
export async function readLockHolder(
  destination: string,
  isAlive: ProcessProbe = isProcessAlive,
  self: number = process.pid,
): Promise<number | null> {
  const pid = await readPid(lockPathFor(destination));
  return pid !== null && isLiveRival(pid, self, isAlive) ? pid : null;
}

async function tryCreate(lockPath: string, pid: number): Promise<boolean> {
  try {
    const handle = await open(lockPath, "wx");
    try {
      await handle.writeFile(`${pid}\n`);
    } finally {
      await handle.close();
    }
    return true;
  } catch (error) {
    if (isNodeError(error) && error.code === "EEXIST") return false;
    throw error;
  }
}

export async function acquireInstanceLock(
  destination: string,
  pid: number = process.pid,
  isAlive: ProcessProbe = isProcessAlive,
): Promise<LockResult> {
  const lockPath = lockPathFor(destination);

  // Second attempt only after clearing a stale lock
  for (let attempt = 0; attempt < 2; attempt++) {
    if (await tryCreate(lockPath, pid)) {
      return {
        acquired: true,
        lock: { path: lockPath, pid, release: () => releaseLock(lockPath, pid) },
      };
    }

    const holderPid = await readPid(lockPath);
    if (holderPid !== null && isLiveRival(holderPid, pid, isAlive)) {
      return { acquired: false, holderPid };
    }

    await rm(lockPath, { force: true });
  }

  const holderPid = await readPid(lockPath);
  return { acquired: false, holderPid: holderPid ?? -1 };
}

async function releaseLock(lockPath: string, pid: number): Promise<void> {
  // Leave a lock that was taken over by someone else alone
  if ((await readPid(lockPath)) === pid) {
    await rm(lockPath, { force: true });
  }
}
