/**
 * Configuration type definitions for keepsake
 */

export type ChecksumAlgorithm = "sha256" | "md5";

/**
 * Flat settings record, one entry per recognised configuration key.
 */
export interface KeepsakeSettings {
  destination_dir: string;
  /** Comma-separated tar exclude globs */
  exclude_patterns: string;
  daily_keep: number;
  weekly_keep: number;
  monthly_keep: number;
  checksum_algo: ChecksumAlgorithm;
  /** Command run after a verified backup; empty disables the hook */
  notify_target: string;
  min_free_mb: number;
  lock_path: string;
  archive_prefix: string;
  /** Empty disables the log file */
  log_file: string;
  /** Retain archives whose digest record is missing instead of pruning them */
  keep_unsealed: boolean;
}

export type SettingsKey = keyof KeepsakeSettings;

export interface RetentionPolicy {
  dailyKeep: number;
  weeklyKeep: number;
  monthlyKeep: number;
  keepUnsealed: boolean;
}

export interface LoadedSettings {
  settings: KeepsakeSettings;
  /** Config file the settings came from, null when defaults were used */
  source: string | null;
  /** Warnings raised while loading, held back until the log file is attached */
  warnings: string[];
}
