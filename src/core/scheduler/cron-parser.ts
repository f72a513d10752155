/**
 * Cron expression parser using cron-parser library
 *
 * Supports: minute hour day-of-month month day-of-week
 *
 * Examples:
 *   "0 * * * *"      - Every hour at minute 0
 *   "0 2 * * *"      - Every day at 2:00 AM
 *   "0 3 * * 0"      - Every Sunday at 3:00 AM
 */

import { CronExpressionParser } from "cron-parser";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

export interface ParseCronOptions {
  timezone?: string;
}

export function parseCron(expression: string, options?: ParseCronOptions): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new Error(`Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`);
  }

  // Throws on malformed fields
  CronExpressionParser.parse(expression, options?.timezone ? { tz: options.timezone } : undefined);
  return { expression: expression.trim(), timezone: options?.timezone };
}

export function matchesCron(cron: ParsedCron, date: Date): boolean {
  const testDate = new Date(date);
  testDate.setSeconds(0, 0);

  // The next occurrence after the previous minute is this minute iff it matches
  const interval = CronExpressionParser.parse(cron.expression, {
    currentDate: new Date(testDate.getTime() - 60_000),
    ...(cron.timezone ? { tz: cron.timezone } : {}),
  });

  const nextDate = interval.next().toDate();
  nextDate.setSeconds(0, 0);

  return nextDate.getTime() === testDate.getTime();
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  const interval = CronExpressionParser.parse(cron.expression, {
    currentDate: fromDate,
    ...(cron.timezone ? { tz: cron.timezone } : {}),
  });
  return interval.next().toDate();
}
