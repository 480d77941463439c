/**
 * Backup cycle type definitions
 */

export interface CaptureFailure {
  path: string;
  error: string;
}

export interface CaptureReport {
  /** Source paths copied without error */
  copied: string[];
  failed: CaptureFailure[];
}

export type CycleStatus = "completed" | "skipped" | "failed";

export interface CycleResult {
  name: string;
  status: CycleStatus;
  /** Whether a new entry reached the store */
  archived: boolean;
  deleted: string[];
  durationMs: number;
}
