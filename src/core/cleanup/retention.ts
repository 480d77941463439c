/**
 * Tiered retention policy
 *
 * With W = shortWindowMinutes and M = maxAgeMinutes, an entry aged `a`
 * whole minutes (rounded) is
 *
 *   fresh     a < W                      kept
 *   expired   a > M                      deleted
 *   bucketed  b·W < a <= (b+1)·W         only the oldest entry of bucket b
 *             for b = 1 .. floor(M/W)-1  is kept
 *
 * Anything else (an age of exactly W, or past the last bucket but not
 * beyond M) is left alone. The result depends only on `now` and the
 * entries, so re-running it over a fresh listing converges.
 */

import type { BackupEntry, RetentionConfig } from "../../types";

const MS_PER_MINUTE = 60 * 1000;

export type RetentionTier = "fresh" | "expired" | "bucketed" | "unbucketed";

export type DeletionReason = "expired" | "bucket_superseded";

export interface RetentionDecision {
  entry: BackupEntry;
  ageMinutes: number;
  tier: RetentionTier;
  /** Set for bucketed entries */
  bucket?: number;
  /** Set when the entry is scheduled for deletion */
  reason?: DeletionReason;
}

export interface RetentionPlan {
  decisions: RetentionDecision[];
  toDelete: Set<string>;
  /** Entries whose createdAt is not a valid instant */
  skipped: BackupEntry[];
}

export function ageInMinutes(now: Date, createdAt: Date): number {
  return Math.round((now.getTime() - createdAt.getTime()) / MS_PER_MINUTE);
}

export function bucketCount(config: RetentionConfig): number {
  return Math.max(0, Math.floor(config.maxAgeMinutes / config.shortWindowMinutes) - 1);
}

/**
 * Bucket index for an age, or null when the age falls in no bucket
 */
export function bucketFor(ageMinutes: number, config: RetentionConfig): number | null {
  const width = config.shortWindowMinutes;
  if (ageMinutes <= width) return null;

  const bucket = Math.ceil(ageMinutes / width) - 1;
  return bucket <= bucketCount(config) ? bucket : null;
}

function classify(ageMinutes: number, config: RetentionConfig): Omit<RetentionDecision, "entry" | "ageMinutes"> {
  if (ageMinutes < config.shortWindowMinutes) return { tier: "fresh" };
  if (ageMinutes > config.maxAgeMinutes) return { tier: "expired", reason: "expired" };

  const bucket = bucketFor(ageMinutes, config);
  return bucket === null ? { tier: "unbucketed" } : { tier: "bucketed", bucket };
}

/**
 * Oldest first; equal ages fall back to createdAt, then name
 */
function compareOldestFirst(a: RetentionDecision, b: RetentionDecision): number {
  return (
    b.ageMinutes - a.ageMinutes ||
    a.entry.createdAt.getTime() - b.entry.createdAt.getTime() ||
    a.entry.name.localeCompare(b.entry.name)
  );
}

export function planRetention(
  now: Date,
  entries: readonly BackupEntry[],
  config: RetentionConfig,
): RetentionPlan {
  const decisions: RetentionDecision[] = [];
  const skipped: BackupEntry[] = [];
  const buckets = new Map<number, RetentionDecision[]>();

  for (const entry of entries) {
    if (Number.isNaN(entry.createdAt.getTime())) {
      skipped.push(entry);
      continue;
    }

    const ageMinutes = ageInMinutes(now, entry.createdAt);
    const decision: RetentionDecision = { entry, ageMinutes, ...classify(ageMinutes, config) };
    decisions.push(decision);

    if (decision.bucket !== undefined) {
      const members = buckets.get(decision.bucket) ?? [];
      members.push(decision);
      buckets.set(decision.bucket, members);
    }
  }

  for (const members of buckets.values()) {
    const [, ...superseded] = [...members].sort(compareOldestFirst);
    for (const decision of superseded) {
      decision.reason = "bucket_superseded";
    }
  }

  const toDelete = new Set<string>();
  for (const decision of decisions) {
    if (decision.reason) toDelete.add(decision.entry.name);
  }

  return { decisions, toDelete, skipped };
}

/**
 * Names of the entries the policy deletes
 */
export function applyRetention(
  now: Date,
  entries: readonly BackupEntry[],
  config: RetentionConfig,
): Set<string> {
  return planRetention(now, entries, config).toDelete;
}
