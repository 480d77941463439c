/**
 * Inline configuration parsing and merging utilities
 */

import type { StoreKind } from "../types";
import { deepMerge } from "./defaults";
import { ConfigError } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Source paths to backup (can be repeated) */
  source?: string[];
  /** Destination root */
  dest?: string;
  /** Seconds between cycles */
  interval?: number;
  /** Store backend */
  store?: StoreKind;
  /** Size cap for every source */
  maxFileSize?: string;
}

export const INLINE_CONFIG_OPTIONS = {
  source: { type: "string" as const, multiple: true as const },
  dest: { type: "string" as const },
  interval: { type: "string" as const },
  store: { type: "string" as const },
  "max-file-size": { type: "string" as const },
};

/**
 * Values parseArgs produces for INLINE_CONFIG_OPTIONS
 */
export interface InlineArgValues {
  source?: string[];
  dest?: string;
  interval?: string;
  store?: string;
  "max-file-size"?: string;
}

export function extractInlineOptions(values: InlineArgValues): InlineConfigOptions {
  let interval: number | undefined;
  if (values.interval !== undefined) {
    interval = Number(values.interval);
    if (!Number.isFinite(interval) || interval <= 0) {
      throw new ConfigError(`--interval must be a positive number of seconds, got "${values.interval}"`);
    }
  }

  const store = values.store;
  if (store !== undefined && store !== "directory" && store !== "container") {
    throw new ConfigError(`--store must be 'directory' or 'container', got "${store}"`);
  }

  return {
    source: values.source,
    dest: values.dest,
    interval,
    store,
    maxFileSize: values["max-file-size"],
  };
}

export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Boolean(
    (options.source && options.source.length > 0) ||
      options.dest ||
      options.interval !== undefined ||
      options.store ||
      options.maxFileSize,
  );
}

/**
 * A config file is optional when sources are given on the command line
 */
export function canRunWithoutConfigFile(options: InlineConfigOptions): boolean {
  return Boolean(options.source && options.source.length > 0);
}

/**
 * Build a partial raw config from inline options
 */
export function buildInlineConfig(options: InlineConfigOptions): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (options.source && options.source.length > 0) {
    config.sources = options.source.map((sourcePath) => ({ path: sourcePath }));
  }
  if (options.dest) {
    config.destination = options.dest;
  }
  if (options.interval !== undefined) {
    config.intervalSeconds = options.interval;
  }
  if (options.store) {
    config.store = options.store;
  }
  if (options.maxFileSize) {
    config.maxFileSize = options.maxFileSize;
  }

  return config;
}

/**
 * Apply inline options on top of a raw config; inline wins
 */
export function mergeInlineConfig(
  config: Record<string, unknown>,
  options: InlineConfigOptions,
): Record<string, unknown> {
  return deepMerge(config, buildInlineConfig(options));
}
