/**
 * Centralized type exports for tierback
 */

// Backup cycle types
export type { CaptureFailure, CaptureReport, CycleResult, CycleStatus } from "./backup";
// Config types
export type {
  DaemonConfig,
  RetentionConfig,
  SourceConfig,
  SourceSpec,
  StoreKind,
  TierbackConfig,
} from "./config";
// Storage types
export type { ArchiveFormat, BackupEntry, IArchiveStore, StagedArchive } from "./storage";
