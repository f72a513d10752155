/**
 * Configuration validation
 */

import type { ChecksumAlgorithm, KeepsakeSettings, SettingsKey } from "../types";
import { CHECKSUM_ALGORITHMS, isChecksumAlgorithm } from "../utils/crypto";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Validator<T> = (value: unknown, key: string, origin: string) => T;

const text: Validator<string> = (value, key, origin) => {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (value === null) return "";
  throw new ConfigError(`${origin}: ${key} must be a string`);
};

const nonEmptyText: Validator<string> = (value, key, origin) => {
  const result = text(value, key, origin).trim();
  if (result.length === 0) {
    throw new ConfigError(`${origin}: ${key} must not be empty`);
  }
  return result;
};

const count: Validator<number> = (value, key, origin) => {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value === "string" && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  throw new ConfigError(`${origin}: ${key} must be a non-negative integer`);
};

const flag: Validator<boolean> = (value, key, origin) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (["true", "yes", "1", "on"].includes(normalized)) return true;
    if (["false", "no", "0", "off", ""].includes(normalized)) return false;
  }
  throw new ConfigError(`${origin}: ${key} must be a boolean`);
};

const algorithm: Validator<ChecksumAlgorithm> = (value, key, origin) => {
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : value;
  if (isChecksumAlgorithm(normalized)) return normalized;
  throw new ConfigError(`${origin}: ${key} must be one of ${CHECKSUM_ALGORITHMS.join(", ")}`);
};

const prefix: Validator<string> = (value, key, origin) => {
  const result = nonEmptyText(value, key, origin);
  if (!/^[A-Za-z0-9._]+$/.test(result)) {
    throw new ConfigError(`${origin}: ${key} may only contain letters, digits, '.' and '_'`);
  }
  return result;
};

/** A bare address, as older configurations wrote NOTIFY_EMAIL */
const MAIL_ADDRESS = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const command: Validator<string> = (value, key, origin) => {
  const result = text(value, key, origin).trim();
  if (MAIL_ADDRESS.test(result)) {
    throw new ConfigError(
      `${origin}: ${key} must be a command, not an e-mail address (for example: mail -s "keepsake backup" ${result})`,
    );
  }
  return result;
};

const validators: { [K in SettingsKey]: Validator<KeepsakeSettings[K]> } = {
  destination_dir: nonEmptyText,
  exclude_patterns: text,
  daily_keep: count,
  weekly_keep: count,
  monthly_keep: count,
  checksum_algo: algorithm,
  notify_target: command,
  min_free_mb: count,
  lock_path: nonEmptyText,
  archive_prefix: prefix,
  log_file: (value, key, origin) => text(value, key, origin).trim(),
  keep_unsealed: flag,
};

export function isSettingsKey(key: string): key is SettingsKey {
  return Object.prototype.hasOwnProperty.call(validators, key);
}

function assign<K extends SettingsKey>(
  target: Partial<KeepsakeSettings>,
  key: K,
  value: unknown,
  origin: string,
): void {
  target[key] = validators[key](value, key, origin);
}

/**
 * Validate a raw key/value record. Unknown keys are rejected rather than ignored.
 */
export function validateSettings(raw: unknown, origin: string): Partial<KeepsakeSettings> {
  if (raw === null || raw === undefined) {
    return {};
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError(`${origin}: settings must be a key/value mapping`);
  }

  const result: Partial<KeepsakeSettings> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isSettingsKey(key)) {
      throw new ConfigError(`${origin}: unknown setting "${key}"`);
    }
    assign(result, key, value, origin);
  }
  return result;
}
