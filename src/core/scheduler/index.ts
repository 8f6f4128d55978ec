/**
 * Scheduler module exports
 */

export { getNextRun, type ParsedCron, parseCron } from "./cron-parser";
export { type PassRunner, Scheduler, type SchedulerStatus } from "./daemon";
