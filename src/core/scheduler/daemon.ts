/**
 * Scheduler daemon: one independent retention pass per cron tick
 */

import type { RetentionRunResult, ScheduleConfig } from "../../types";
import { logger } from "../../utils/logger";
import { getNextRun, type ParsedCron, parseCron } from "./cron-parser";

export type PassRunner = () => Promise<RetentionRunResult>;

// setTimeout fires at once past 2^31-1 ms, so long gaps are waited out in steps
export const MAX_TIMER_DELAY_MS = 60 * 60 * 1000;

export interface SchedulerStatus {
  cron: string;
  timezone?: string;
  running: boolean;
  lastRun: Date | null;
  nextRun: Date | null;
}

export class Scheduler {
  private readonly cron: ParsedCron;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private lastRun: Date | null = null;
  private nextRun: Date | null = null;

  constructor(
    schedule: ScheduleConfig,
    private readonly runPass: PassRunner,
  ) {
    this.cron = parseCron(schedule.cron, schedule.timezone);
  }

  start(): void {
    if (this.running) {
      logger.warn("Scheduler is already running");
      return;
    }

    this.running = true;
    logger.info(`Scheduler started (${this.cron.expression})`);
    this.scheduleNext();
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRun = null;

    logger.info("Scheduler stopped");
  }

  getStatus(): SchedulerStatus {
    return {
      cron: this.cron.expression,
      timezone: this.cron.timezone,
      running: this.running,
      lastRun: this.lastRun,
      nextRun: this.running ? this.nextRun : getNextRun(this.cron),
    };
  }

  private scheduleNext(): void {
    if (!this.running) {
      return;
    }

    const next = getNextRun(this.cron);
    this.nextRun = next;
    logger.debug(`Next retention pass at ${next.toISOString()}`);

    this.armTimer(next);
  }

  private armTimer(next: Date): void {
    const remaining = next.getTime() - Date.now();

    this.timer = setTimeout(
      () => {
        if (Date.now() < next.getTime()) {
          this.armTimer(next);
          return;
        }
        this.tick().catch((error: unknown) => {
          logger.error(`Scheduler tick failed: ${(error as Error).message}`);
        });
      },
      Math.min(Math.max(0, remaining), MAX_TIMER_DELAY_MS),
    );
  }

  private async tick(): Promise<void> {
    this.timer = null;
    this.lastRun = new Date();

    try {
      const result = await this.runPass();
      logger.info(
        `Retention pass finished: ${result.checked} checked, ${result.removed} removed, ${result.wouldRemove} would be removed`,
      );
    } catch (error) {
      logger.error(`Retention pass failed: ${(error as Error).message}`);
    }

    this.scheduleNext();
  }
}
