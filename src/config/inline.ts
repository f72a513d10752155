/**
 * Command-line overrides for configuration settings
 */

import * as path from "node:path";
import type { KeepsakeSettings, SettingsKey } from "../types";
import { normalizeKey } from "./defaults";
import { ConfigError, validateSettings } from "./validator";

/**
 * CLI option definitions for inline settings (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  dest: { type: "string" as const, short: "d" },
  exclude: { type: "string" as const },
  "daily-keep": { type: "string" as const },
  "weekly-keep": { type: "string" as const },
  "monthly-keep": { type: "string" as const },
  "checksum-algo": { type: "string" as const },
  "min-free-mb": { type: "string" as const },
  "lock-path": { type: "string" as const },
  notify: { type: "string" as const },
  prefix: { type: "string" as const },
  set: { type: "string" as const, multiple: true },
} as const;

const FLAG_KEYS: Record<string, SettingsKey> = {
  dest: "destination_dir",
  exclude: "exclude_patterns",
  "daily-keep": "daily_keep",
  "weekly-keep": "weekly_keep",
  "monthly-keep": "monthly_keep",
  "checksum-algo": "checksum_algo",
  "min-free-mb": "min_free_mb",
  "lock-path": "lock_path",
  notify: "notify_target",
  prefix: "archive_prefix",
};

const PATH_KEYS = ["destination_dir", "lock_path", "log_file"] as const;

export type InlineOverrides = Partial<KeepsakeSettings>;

type ParsedValues = Record<string, string | boolean | (string | boolean)[] | undefined>;

/**
 * Extract validated setting overrides from parsed CLI values.
 * `--set key=value` accepts any settings key; dedicated flags win over `--set`.
 */
export function extractOverrides(values: ParsedValues): InlineOverrides {
  const raw: Record<string, string> = {};

  const assignments = values.set;
  if (Array.isArray(assignments)) {
    for (const assignment of assignments) {
      if (typeof assignment !== "string") continue;
      const eq = assignment.indexOf("=");
      if (eq <= 0) {
        throw new ConfigError(`--set expects key=value, got "${assignment}"`);
      }
      raw[normalizeKey(assignment.slice(0, eq).trim())] = assignment.slice(eq + 1);
    }
  }

  for (const [flag, key] of Object.entries(FLAG_KEYS)) {
    const value = values[flag];
    if (typeof value === "string") {
      raw[key] = value;
    }
  }

  return validateSettings(raw, "command line");
}

/**
 * Merge overrides into loaded settings. Relative paths given on the command
 * line resolve against the working directory.
 */
export function applyOverrides(
  settings: KeepsakeSettings,
  overrides: InlineOverrides,
  cwd: string = process.cwd(),
): KeepsakeSettings {
  const merged: KeepsakeSettings = { ...settings, ...overrides };

  for (const key of PATH_KEYS) {
    const value = overrides[key];
    if (typeof value === "string" && value.length > 0) {
      merged[key] = path.resolve(cwd, value);
    }
  }

  return merged;
}
