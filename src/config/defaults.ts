/**
 * Default configuration values
 */

import type { TierbackConfig } from "../types";

export const DEFAULT_CONFIG = {
  // version and sources have no defaults
  destination: "~/.backups",
  store: "directory",
  maxFileSize: "10M",
  intervalSeconds: 600,
  minFreeSpaceKB: 1_000_000,
  retention: {
    shortWindowMinutes: 1440,
    maxAgeMinutes: 525_600,
  },
  logLevel: "info",
} satisfies Omit<TierbackConfig, "version" | "sources">;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target. Arrays are replaced.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
