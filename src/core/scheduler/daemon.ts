/**
 * Backup daemon
 */

import { mkdir, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import { createArchiveStore } from "../../storage";
import type { CycleResult, DaemonConfig, IArchiveStore } from "../../types";
import { getErrorMessage } from "../../utils/errors";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { formatWallClock, generateCycleName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";
import { ensureDestination } from "../backup/destination";
import { type PackFn, packDirectory } from "../backup/packer";
import { type CopyFn, captureSnapshot, rsyncCopy } from "../backup/snapshot-capture";
import { checkFreeSpace, type FreeSpaceQuery, statfsFreeKB } from "../backup/space-guard";
import { planRetention } from "../cleanup/retention";
import { acquireInstanceLock, type InstanceLock, type ProcessProbe, isProcessAlive } from "./instance-lock";
import { waitForInterval } from "./wait";

export type DaemonState = "idle" | "running" | "shutting_down";

/**
 * Collaborators the daemon drives. All default to the real implementations.
 */
export interface DaemonDeps {
  store: IArchiveStore;
  copy: CopyFn;
  pack: PackFn;
  freeSpace: FreeSpaceQuery;
  now: () => Date;
  pid: number;
  isAlive: ProcessProbe;
}

export interface DaemonHandle {
  readonly pid: number;
  readonly lockPath: string;
  /** Request a graceful stop; repeated calls are ignored */
  stop(): void;
  /** Settles once the final cycle has run and the lock is released */
  readonly done: Promise<void>;
}

export type StartResult =
  | { status: "started"; handle: DaemonHandle }
  | { status: "already-running"; pid: number };

export const STAGING_PREFIX = ".cycle-";

export class Daemon {
  private state: DaemonState = "idle";
  private readonly controller = new AbortController();
  private readonly deps: DaemonDeps;

  constructor(
    private readonly config: DaemonConfig,
    deps: Partial<DaemonDeps> = {},
  ) {
    this.deps = {
      store: deps.store ?? createArchiveStore(config),
      copy: deps.copy ?? rsyncCopy,
      pack: deps.pack ?? packDirectory,
      freeSpace: deps.freeSpace ?? statfsFreeKB,
      now: deps.now ?? (() => new Date()),
      pid: deps.pid ?? process.pid,
      isAlive: deps.isAlive ?? isProcessAlive,
    };
  }

  getState(): DaemonState {
    return this.state;
  }

  /**
   * Take ownership of the destination and start the loop. Throws
   * DestinationError only when the destination root cannot be created.
   */
  async start(): Promise<StartResult> {
    if (this.state !== "idle") {
      logger.warn("Daemon is already running");
      return { status: "already-running", pid: this.deps.pid };
    }

    await ensureDestination(this.config.destination);

    const result = await acquireInstanceLock(this.config.destination, this.deps.pid, this.deps.isAlive);
    if (!result.acquired) {
      logger.info(`Backup process already running (pid ${result.holderPid})`);
      return { status: "already-running", pid: result.holderPid };
    }

    const { lock } = result;
    this.state = "running";
    logger.info(`Backup process started (pid ${lock.pid}, destination ${this.config.destination})`);

    const done = this.loop().then(() => this.release(lock));

    return {
      status: "started",
      handle: {
        pid: lock.pid,
        lockPath: lock.path,
        stop: () => this.stop(),
        done,
      },
    };
  }

  stop(): void {
    if (this.state === "shutting_down") {
      logger.debug("Stop already requested, ignoring");
      return;
    }
    if (this.state !== "running") {
      return;
    }

    this.state = "shutting_down";
    logger.info("Stop requested, running final backup");
    this.controller.abort();
  }

  private async loop(): Promise<void> {
    const { signal } = this.controller;
    const intervalMs = this.config.intervalSeconds * 1000;

    while (!signal.aborted) {
      await this.runCycle();
      if ((await waitForInterval(intervalMs, signal)) === "stopped") break;
    }

    await this.runCycle();
    logger.info("Backup process stopped");
  }

  private async release(lock: InstanceLock): Promise<void> {
    try {
      await lock.release();
    } catch (error) {
      logger.warn(`Failed to release lock ${lock.path}: ${getErrorMessage(error)}`);
    }
  }

  /**
   * One guarded capture → archive → retain pass. Never throws.
   */
  async runCycle(): Promise<CycleResult> {
    const startedAt = this.deps.now();
    const name = generateCycleName(startedAt);
    const result: CycleResult = { name, status: "completed", archived: false, deleted: [], durationMs: 0 };

    logger.info(formatWallClock(startedAt));

    try {
      await ensureDestination(this.config.destination);

      const space = await checkFreeSpace(this.config.destination, this.config.minFreeSpaceKB, this.deps.freeSpace);
      if (!space.ok) {
        logger.warn(`${space.reason}. Skipping this backup.`);
        result.status = "skipped";
        return result;
      }

      result.archived = await this.archiveCycle(name);
      result.deleted = await this.prune();
      if (!result.archived) result.status = "failed";
    } catch (error) {
      logger.error(`Backup cycle ${name} failed: ${getErrorMessage(error)}`);
      result.status = "failed";
    } finally {
      result.durationMs = this.deps.now().getTime() - startedAt.getTime();
    }

    logger.debug(`Cycle ${name} ${result.status} in ${formatDuration(result.durationMs)}`);
    return result;
  }

  private async archiveCycle(name: string): Promise<boolean> {
    const { store } = this.deps;
    const workDir = path.join(this.config.destination, `${STAGING_PREFIX}${name}`);
    const snapshotDir = path.join(workDir, "snapshot");
    const archivePath = path.join(workDir, `${name}.${store.archiveFormat}`);

    try {
      await mkdir(snapshotDir, { recursive: true });

      const report = await captureSnapshot(this.config.sources, snapshotDir, this.deps.copy);
      if (report.failed.length > 0) {
        logger.warn(`${report.failed.length} of ${this.config.sources.length} source(s) failed to copy`);
      }

      logger.info(`Creating: ${name}.${store.archiveFormat}`);
      await this.deps.pack(snapshotDir, archivePath, store.archiveFormat);
      const { size } = await stat(archivePath);
      await store.add({ name, path: archivePath });

      logger.info(`Backup ${name} stored (${formatBytes(size)})`);
      return true;
    } catch (error) {
      logger.error(`Archive write failed for ${name}: ${getErrorMessage(error)}`);
      return false;
    } finally {
      await this.discard(workDir);
    }
  }

  private async discard(workDir: string): Promise<void> {
    if (!isPathWithinDir(workDir, this.config.destination)) return;
    try {
      await rm(workDir, { recursive: true, force: true });
    } catch (error) {
      logger.warn(`Failed to remove staging directory ${workDir}: ${getErrorMessage(error)}`);
    }
  }

  private async prune(): Promise<string[]> {
    try {
      const entries = await this.deps.store.list();
      const plan = planRetention(this.deps.now(), entries, this.config.retention);

      for (const entry of plan.skipped) {
        logger.warn(`Skipping ${entry.name} during retention: unparseable timestamp`);
      }

      if (plan.toDelete.size === 0) return [];

      await this.deps.store.remove(plan.toDelete);

      for (const decision of plan.decisions) {
        if (decision.reason) {
          logger.info(`Deleted ${decision.entry.name} (${decision.reason}, ${decision.ageMinutes} min old)`);
        }
      }

      return [...plan.toDelete];
    } catch (error) {
      logger.error(`Retention pass failed: ${getErrorMessage(error)}`);
      return [];
    }
  }
}
