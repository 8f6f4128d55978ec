/**
 * Cron expression handling using cron-parser
 *
 * Supports: minute hour day-of-month month day-of-week
 *
 * Examples:
 *   "0 4 * * *"      - Every day at 4:00 AM
 *   "15 3 * * 1"     - Every Monday at 3:15 AM
 */

import { CronExpressionParser } from "cron-parser";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

export function parseCron(expression: string, timezone?: string): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new Error(
      `Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`,
    );
  }

  // Throws on invalid fields or an unknown timezone
  CronExpressionParser.parse(expression, timezone ? { tz: timezone } : undefined);
  return { expression, timezone };
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  const interval = CronExpressionParser.parse(cron.expression, {
    currentDate: fromDate,
    ...(cron.timezone && { tz: cron.timezone }),
  });
  return interval.next().toDate();
}
