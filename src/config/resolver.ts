/**
 * Configuration path resolution and conversion to the daemon's config
 */

import * as path from "node:path";
import type { DaemonConfig, SourceSpec, TierbackConfig } from "../types";
import { parseSize } from "../utils/format";
import { expandHome } from "../utils/path";
import { ConfigError } from "./validator";

/**
 * Expand `~` and resolve relative paths against the config file's directory
 */
export function resolvePath(value: string, baseDir: string, homeDir?: string): string {
  return path.resolve(baseDir, expandHome(value, homeDir));
}

function sizeInBytes(value: string | number, field: string): number {
  const bytes = parseSize(value);
  if (bytes === null) {
    throw new ConfigError(`${field} must be a size such as 100k or 10M`);
  }
  return bytes;
}

/**
 * Turn a validated config into the frozen value the daemon runs on
 */
export function toDaemonConfig(
  config: TierbackConfig,
  baseDir: string,
  homeDir?: string,
): DaemonConfig {
  const defaultMaxBytes = sizeInBytes(config.maxFileSize, "maxFileSize");

  const sources: SourceSpec[] = config.sources.map((source, i) =>
    Object.freeze({
      path: resolvePath(source.path, baseDir, homeDir),
      maxFileSizeBytes:
        source.maxFileSize === undefined
          ? defaultMaxBytes
          : sizeInBytes(source.maxFileSize, `sources[${i}].maxFileSize`),
    }),
  );

  return Object.freeze({
    sources: Object.freeze(sources),
    destination: resolvePath(config.destination, baseDir, homeDir),
    store: config.store,
    intervalSeconds: config.intervalSeconds,
    minFreeSpaceKB: config.minFreeSpaceKB,
    retention: Object.freeze({ ...config.retention }),
    logLevel: config.logLevel,
  });
}
