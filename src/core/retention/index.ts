/**
 * Retention module exports
 */

export {
  evaluateItem,
  evaluateSnapshot,
  projectRatio,
  SECONDS_PER_DAY,
  SECONDS_PER_YEAR,
} from "./evaluator";
export {
  currentEpochSeconds,
  describeDecision,
  type Reporter,
  type RetentionRunOptions,
  runRetention,
} from "./orchestrator";
