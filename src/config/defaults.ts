/**
 * Default configuration values
 */

import * as os from "node:os";
import * as path from "node:path";
import type { KeepsakeSettings } from "../types";
import { DEFAULT_ARCHIVE_PREFIX } from "../utils/naming";

export const DEFAULT_SETTINGS: Readonly<KeepsakeSettings> = {
  destination_dir: "./backups",
  exclude_patterns: ".git,node_modules,.cache",
  daily_keep: 7,
  weekly_keep: 4,
  monthly_keep: 3,
  checksum_algo: "sha256",
  notify_target: "",
  min_free_mb: 100,
  lock_path: path.join(os.tmpdir(), "keepsake.lock"),
  archive_prefix: DEFAULT_ARCHIVE_PREFIX,
  log_file: "./keepsake.log",
  keep_unsealed: false,
};

export const CONFIG_FILE_NAMES = [
  "keepsake.conf",
  "keepsake.config.yaml",
  "keepsake.config.yml",
  "keepsake.config.json",
] as const;

/**
 * Upper-case keys accepted in key=value files, as written by older
 * shell-style configurations.
 */
export const LEGACY_KEY_ALIASES: Readonly<Record<string, keyof KeepsakeSettings>> = {
  BACKUP_DESTINATION: "destination_dir",
  EXCLUDE_PATTERNS: "exclude_patterns",
  DAILY_KEEP: "daily_keep",
  WEEKLY_KEEP: "weekly_keep",
  MONTHLY_KEEP: "monthly_keep",
  CHECKSUM_ALGO: "checksum_algo",
  NOTIFY_EMAIL: "notify_target",
  NOTIFY_TARGET: "notify_target",
  MIN_FREE_MB: "min_free_mb",
  LOCKFILE: "lock_path",
  LOCK_PATH: "lock_path",
  ARCHIVE_PREFIX: "archive_prefix",
  LOG_FILE: "log_file",
  KEEP_UNSEALED: "keep_unsealed",
};

/**
 * Normalize a key as written in a file to a settings key.
 * Unknown keys pass through lower-cased so validation can reject them.
 */
export function normalizeKey(key: string): string {
  return LEGACY_KEY_ALIASES[key] ?? key.toLowerCase();
}
