/**
 * Configuration validation
 */

import type { TierbackConfig } from "../types";
import { parseSize } from "../utils/format";
import { isLogLevel } from "../utils/logger";
import { isPlainObject } from "./defaults";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator = (config: Record<string, unknown>) => void;

/** Longest wait a Node timer accepts, in whole seconds (2^31 - 1 ms) */
export const MAX_INTERVAL_SECONDS = 2_147_483;

function isSize(value: unknown): boolean {
  return (typeof value === "string" || typeof value === "number") && parseSize(value) !== null;
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

const validators: Validator[] = [
  function version(c) {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  function sources(c) {
    if (!Array.isArray(c.sources)) {
      throw new ConfigError("Config must have a 'sources' list");
    }
    if (c.sources.length === 0) {
      throw new ConfigError("Config must have at least one source");
    }
    c.sources.forEach((source: unknown, i) => {
      if (!isPlainObject(source)) {
        throw new ConfigError(`sources[${i}] must be an object`);
      }
      if (!source.path || typeof source.path !== "string") {
        throw new ConfigError(`sources[${i}].path must be a string`);
      }
      if (source.maxFileSize !== undefined && !isSize(source.maxFileSize)) {
        throw new ConfigError(`sources[${i}].maxFileSize must be a size such as 100k or 10M`);
      }
    });
  },

  function destination(c) {
    if (!c.destination || typeof c.destination !== "string") {
      throw new ConfigError("destination must be a string");
    }
  },

  function store(c) {
    if (c.store !== "directory" && c.store !== "container") {
      throw new ConfigError("store must be 'directory' or 'container'");
    }
  },

  function maxFileSize(c) {
    if (!isSize(c.maxFileSize)) {
      throw new ConfigError("maxFileSize must be a size such as 100k or 10M");
    }
  },

  function intervalSeconds(c) {
    const interval = c.intervalSeconds;
    if (!isPositiveNumber(interval)) {
      throw new ConfigError("intervalSeconds must be a positive number");
    }
    if (interval > MAX_INTERVAL_SECONDS) {
      throw new ConfigError(`intervalSeconds must be at most ${MAX_INTERVAL_SECONDS}`);
    }
  },

  function minFreeSpaceKB(c) {
    if (typeof c.minFreeSpaceKB !== "number" || !Number.isFinite(c.minFreeSpaceKB) || c.minFreeSpaceKB < 0) {
      throw new ConfigError("minFreeSpaceKB must be a non-negative number");
    }
  },

  function retention(c) {
    if (!isPlainObject(c.retention)) {
      throw new ConfigError("Config must have a 'retention' section");
    }
    const { shortWindowMinutes, maxAgeMinutes } = c.retention;
    if (!isPositiveNumber(shortWindowMinutes)) {
      throw new ConfigError("retention.shortWindowMinutes must be a positive number");
    }
    if (!isPositiveNumber(maxAgeMinutes) || maxAgeMinutes <= shortWindowMinutes) {
      throw new ConfigError("retention.maxAgeMinutes must be greater than retention.shortWindowMinutes");
    }
  },

  function logLevel(c) {
    if (!isLogLevel(c.logLevel)) {
      throw new ConfigError("logLevel must be one of debug, info, warn, error");
    }
  },
];

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is TierbackConfig {
  if (!isPlainObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of validators) {
    validate(config);
  }
}
