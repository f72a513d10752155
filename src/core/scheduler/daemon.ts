/**
 * Scheduler daemon
 */

import type { RunContext } from "../../types";
import { logger } from "../../utils/logger";
import { runBackup } from "../backup/orchestrator";
import { errorMessage } from "../errors";
import { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";

export interface SchedulerOptions {
  /** Runs one backup; defaults to the backup pipeline */
  job?: (ctx: RunContext, sourceDir: string) => Promise<unknown>;
  checkIntervalMs?: number;
}

export class Scheduler {
  private readonly cron: ParsedCron;
  private readonly job: (ctx: RunContext, sourceDir: string) => Promise<unknown>;
  private readonly checkIntervalMs: number;
  private checkInterval: NodeJS.Timeout | null = null;
  private lastRun: Date | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(
    private readonly ctx: RunContext,
    private readonly sourceDir: string,
    expression: string,
    options: SchedulerOptions = {},
  ) {
    this.cron = parseCron(expression);
    this.job = options.job ?? runBackup;
    this.checkIntervalMs = options.checkIntervalMs ?? 60 * 1000;
  }

  get running(): boolean {
    return this.checkInterval !== null;
  }

  start(): void {
    if (this.checkInterval) {
      logger.warn("Scheduler is already running");
      return;
    }

    logger.info(`Scheduler started (${this.cron.expression}), next run ${getNextRun(this.cron).toISOString()}`);

    this.checkInterval = setInterval(() => {
      void this.tick(this.ctx.now());
    }, this.checkIntervalMs);
    void this.tick(this.ctx.now());
  }

  /**
   * Stop scheduling and wait for a backup already in progress.
   */
  async stop(): Promise<void> {
    if (this.checkInterval) {
      clearInterval(this.checkInterval);
      this.checkInterval = null;
      logger.info("Scheduler stopped");
    }
    await this.inFlight;
  }

  /**
   * Run the job if `now` falls on a scheduled minute not yet handled.
   * Runs never overlap: a minute that comes due while a run is in flight is skipped.
   */
  async tick(now: Date): Promise<boolean> {
    const minute = new Date(now);
    minute.setSeconds(0, 0);

    if (!matchesCron(this.cron, minute)) return false;
    if (this.lastRun && this.lastRun.getTime() === minute.getTime()) return false;

    if (this.inFlight) {
      logger.warn(`Skipping scheduled run at ${minute.toISOString()}: previous run still in progress`);
      return false;
    }

    this.lastRun = minute;
    logger.info(`Schedule triggered at ${minute.toISOString()}`);

    this.inFlight = this.job(this.ctx, this.sourceDir)
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error(`Scheduled backup failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.inFlight = null;
      });

    await this.inFlight;
    return true;
  }

  getStatus(): { cron: string; lastRun: Date | null; nextRun: Date } {
    return { cron: this.cron.expression, lastRun: this.lastRun, nextRun: getNextRun(this.cron) };
  }
}
