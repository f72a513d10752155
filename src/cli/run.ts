/**
 * Shared command plumbing: option set, settings resolution and the failure path
 */

import { applyOverrides, ConfigError, extractOverrides, INLINE_CONFIG_OPTIONS, loadSettings } from "../config";
import { createRunContext } from "../core/context";
import { errorMessage, isOperationError } from "../core/errors";
import type { KeepsakeSettings, RunContext } from "../types";
import { logger, setLogFile, setLogLevel } from "../utils/logger";

/**
 * Options every command accepts (for parseArgs)
 */
export const RUN_OPTIONS = {
  config: { type: "string" as const, short: "c" },
  "dry-run": { type: "boolean" as const, default: false },
  verbose: { type: "boolean" as const, short: "v", default: false },
  help: { type: "boolean" as const, short: "h", default: false },
  ...INLINE_CONFIG_OPTIONS,
} as const;

export type RunValues = Record<string, string | boolean | (string | boolean)[] | undefined> & {
  config?: string;
  "dry-run"?: boolean;
  verbose?: boolean;
};

export interface PreparedRun {
  settings: KeepsakeSettings;
  ctx: RunContext;
  /** Config file in effect, null when running on defaults */
  configSource: string | null;
}

/**
 * Resolve settings (file, then command-line overrides), attach the log file
 * and build the run context.
 */
export async function prepareRun(values: RunValues, cwd: string = process.cwd()): Promise<PreparedRun> {
  if (values.verbose) {
    setLogLevel("debug");
  }

  const loaded = await loadSettings(values.config, cwd);
  const settings = applyOverrides(loaded.settings, extractOverrides(values), cwd);

  setLogFile(settings.log_file || null);
  for (const warning of loaded.warnings) {
    logger.warn(warning);
  }
  logger.debug("Effective settings", settings);

  const ctx = createRunContext(settings, { dryRun: values["dry-run"] === true });
  return { settings, ctx, configSource: loaded.source };
}

/**
 * The single failure path for commands: log and map to an exit code.
 * Any run guard has already been released by the time an error reaches here.
 */
export function terminate(error: unknown, verbose?: boolean): number {
  if (error instanceof ConfigError) {
    logger.error(`Configuration error: ${error.message}`);
  } else if (isOperationError(error)) {
    logger.error(`${error.code}: ${error.message}`);
  } else {
    logger.error(errorMessage(error));
  }

  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }

  return 1;
}
