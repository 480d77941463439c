/**
 * Backup module exports
 */

export { DestinationError, ensureDestination, LOG_FILE_NAME } from "./destination";
export { type PackFn, packDirectory } from "./packer";
export {
  type CaptureTarget,
  type CopyFn,
  captureSnapshot,
  resolveCaptureTargets,
  rsyncCopy,
} from "./snapshot-capture";
export { checkFreeSpace, type FreeSpaceQuery, type SpaceCheck, statfsFreeKB } from "./space-guard";
