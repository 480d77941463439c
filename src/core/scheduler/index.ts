/**
 * Scheduler module exports
 */

export {
  Daemon,
  type DaemonDeps,
  type DaemonHandle,
  type DaemonState,
  STAGING_PREFIX,
  type StartResult,
} from "./daemon";
export {
  acquireInstanceLock,
  type InstanceLock,
  isProcessAlive,
  LOCK_FILE_NAME,
  type LockResult,
  lockPathFor,
  type ProcessProbe,
  readLockHolder,
} from "./instance-lock";
export { type WaitOutcome, waitForInterval } from "./wait";
