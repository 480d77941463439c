/**
 * Cleanup module exports
 */

export {
  ageInMinutes,
  applyRetention,
  bucketCount,
  bucketFor,
  type DeletionReason,
  planRetention,
  type RetentionDecision,
  type RetentionPlan,
  type RetentionTier,
} from "./retention";
