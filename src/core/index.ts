/**
 * Core module exports
 */

// Pass
export { type PassOptions, policyFromConfig, runPass } from "./pass";

// Retention
export {
  currentEpochSeconds,
  describeDecision,
  evaluateItem,
  evaluateSnapshot,
  projectRatio,
  type Reporter,
  type RetentionRunOptions,
  runRetention,
  SECONDS_PER_DAY,
  SECONDS_PER_YEAR,
} from "./retention";

// Scheduler
export {
  getNextRun,
  type ParsedCron,
  parseCron,
  type PassRunner,
  Scheduler,
  type SchedulerStatus,
} from "./scheduler";
