/**
 * Configuration file loading
 */

import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { errorMessage } from "../core/errors";
import type { KeepsakeSettings, LoadedSettings } from "../types";
import { logger } from "../utils/logger";
import { CONFIG_FILE_NAMES, DEFAULT_SETTINGS, normalizeKey } from "./defaults";
import { ConfigError, validateSettings } from "./validator";

export {
  applyOverrides,
  extractOverrides,
  INLINE_CONFIG_OPTIONS,
  type InlineOverrides,
} from "./inline";
export { ConfigError } from "./validator";

const LINE_PATTERN = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;

function unquote(raw: string, origin: string, lineNumber: number): string {
  const value = raw.trim();
  const quote = value[0];

  if (quote === '"' || quote === "'") {
    const end = value.indexOf(quote, 1);
    if (end === -1) {
      throw new ConfigError(`${origin}:${lineNumber}: unterminated quoted value`);
    }
    const rest = value.slice(end + 1).trim();
    if (rest.length > 0 && !rest.startsWith("#")) {
      throw new ConfigError(`${origin}:${lineNumber}: unexpected text after quoted value`);
    }
    return value.slice(1, end);
  }

  // Unquoted values may carry a trailing " # comment"
  const comment = value.search(/\s#/);
  return comment === -1 ? value : value.slice(0, comment).trimEnd();
}

/**
 * Parse `key=value` lines. Values are data only; nothing is evaluated.
 */
export function parseKeyValue(content: string, origin: string): Record<string, string> {
  const result: Record<string, string> = {};
  const lines = content.split(/\r?\n/);

  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed.length === 0 || trimmed.startsWith("#")) return;

    const match = LINE_PATTERN.exec(trimmed);
    if (!match || match[1] === undefined || match[2] === undefined) {
      throw new ConfigError(`${origin}:${index + 1}: expected key=value, got "${trimmed}"`);
    }

    result[normalizeKey(match[1])] = unquote(match[2], origin, index + 1);
  });

  return result;
}

function normalizeKeys(raw: unknown): unknown {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    return raw;
  }
  return Object.fromEntries(Object.entries(raw).map(([key, value]) => [normalizeKey(key), value]));
}

export function parseConfigContent(content: string, filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();

  if (ext === ".yaml" || ext === ".yml") {
    try {
      return normalizeKeys(yaml.load(content));
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return normalizeKeys(JSON.parse(content));
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  return parseKeyValue(content, filePath);
}

/**
 * Resolve relative paths against the directory the settings came from.
 */
export function resolvePaths(settings: KeepsakeSettings, baseDir: string): KeepsakeSettings {
  return {
    ...settings,
    destination_dir: path.resolve(baseDir, settings.destination_dir),
    lock_path: path.resolve(baseDir, settings.lock_path),
    log_file: settings.log_file ? path.resolve(baseDir, settings.log_file) : "",
  };
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath) && statSync(configPath).isFile()) {
      return configPath;
    }
  }
  return null;
}

/**
 * Load settings from `configPath`, or from the first config file found in `cwd`.
 * A missing file is not an error: defaults apply and a warning is returned
 * for the caller to log once the log file named by the settings is attached.
 */
export async function loadSettings(configPath?: string, cwd: string = process.cwd()): Promise<LoadedSettings> {
  const target = configPath ? path.resolve(cwd, configPath) : findConfigFile(cwd);

  if (!target || !existsSync(target)) {
    return {
      settings: resolvePaths({ ...DEFAULT_SETTINGS }, cwd),
      source: null,
      warnings: [`Config file not found at ${target ?? path.join(cwd, CONFIG_FILE_NAMES[0])}, using defaults`],
    };
  }

  let content: string;
  try {
    content = await readFile(target, "utf8");
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${target}: ${errorMessage(e)}`);
  }

  const overrides = validateSettings(parseConfigContent(content, target), target);
  const settings = resolvePaths({ ...DEFAULT_SETTINGS, ...overrides }, path.dirname(target));

  logger.debug(`Loaded config from ${target}`);
  return { settings, source: target, warnings: [] };
}
