/**
 * Configuration type definitions for tierback
 */

import type { LogLevel } from "../utils/logger";

export type StoreKind = "directory" | "container";

/**
 * A source tree as written in the config file
 */
export interface SourceConfig {
  path: string;
  /** Per-source override of the global size cap, rsync-style (`100k`, `10M`) */
  maxFileSize?: string | number;
}

export interface RetentionConfig {
  /** Width W of every bucket; entries younger than this are always kept */
  shortWindowMinutes: number;
  /** Entries older than M are always deleted */
  maxAgeMinutes: number;
}

/**
 * Config file shape after defaults are merged in
 */
export interface TierbackConfig {
  version: string;
  sources: SourceConfig[];
  destination: string;
  store: StoreKind;
  maxFileSize: string | number;
  intervalSeconds: number;
  minFreeSpaceKB: number;
  retention: RetentionConfig;
  logLevel: LogLevel;
}

export interface SourceSpec {
  readonly path: string;
  readonly maxFileSizeBytes: number;
}

/**
 * Resolved, immutable configuration handed to the daemon
 */
export interface DaemonConfig {
  readonly sources: readonly SourceSpec[];
  readonly destination: string;
  readonly store: StoreKind;
  readonly intervalSeconds: number;
  readonly minFreeSpaceKB: number;
  readonly retention: Readonly<RetentionConfig>;
  readonly logLevel: LogLevel;
}
