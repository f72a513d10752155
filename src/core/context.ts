/**
 * Run context construction
 */

import type { KeepsakeSettings, RunContext } from "../types";
import { parseExcludePatterns } from "./backup/archive-builder";

export interface ContextOptions {
  dryRun?: boolean;
  now?: () => Date;
}

export function createRunContext(settings: KeepsakeSettings, options: ContextOptions = {}): RunContext {
  return {
    destinationDir: settings.destination_dir,
    archivePrefix: settings.archive_prefix,
    excludePatterns: parseExcludePatterns(settings.exclude_patterns),
    checksumAlgorithm: settings.checksum_algo,
    retention: {
      dailyKeep: settings.daily_keep,
      weeklyKeep: settings.weekly_keep,
      monthlyKeep: settings.monthly_keep,
      keepUnsealed: settings.keep_unsealed,
    },
    minFreeMb: settings.min_free_mb,
    lockPath: settings.lock_path,
    notifyTarget: settings.notify_target || null,
    dryRun: options.dryRun ?? false,
    now: options.now ?? (() => new Date()),
  };
}
