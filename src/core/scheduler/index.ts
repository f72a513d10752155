/**
 * Scheduler module exports
 */

export { getNextRun, matchesCron, type ParsedCron, parseCron } from "./cron-parser";
export { Scheduler, type SchedulerOptions } from "./daemon";
