/**
 * Core module exports
 */

// Backup
export {
  type CopyFn,
  captureSnapshot,
  checkFreeSpace,
  DestinationError,
  ensureDestination,
  type FreeSpaceQuery,
  LOG_FILE_NAME,
  type PackFn,
  packDirectory,
  rsyncCopy,
  type SpaceCheck,
  statfsFreeKB,
} from "./backup";

// Cleanup
export {
  applyRetention,
  type DeletionReason,
  planRetention,
  type RetentionDecision,
  type RetentionPlan,
} from "./cleanup";

// Scheduler
export {
  acquireInstanceLock,
  Daemon,
  type DaemonDeps,
  type DaemonHandle,
  type DaemonState,
  readLockHolder,
  type StartResult,
} from "./scheduler";
