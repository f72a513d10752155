/**
 * Post-success notification hook
 */

import type { ArchiveHandle, RunContext } from "../../types";
import { logger } from "../../utils/logger";
import { describeFailure, run } from "../../utils/shell";
import { errorMessage } from "../errors";

export const NOTIFY_TIMEOUT_MS = 60_000;

/**
 * Run the configured notify command after a verified backup.
 * Resolves true when the command ran and exited 0. Never rejects: a failing
 * hook must not fail the backup.
 */
export async function runNotifyHook(ctx: RunContext, archive: ArchiveHandle): Promise<boolean> {
  const command = ctx.notifyTarget;
  if (!command) return false;

  if (ctx.dryRun) {
    logger.info(`Dry-run: would run notify hook: ${command}`);
    return false;
  }

  logger.info(`Running notify hook: ${command}`);

  try {
    const result = await run(command, [], {
      shell: true,
      timeoutMs: NOTIFY_TIMEOUT_MS,
      env: {
        ...process.env,
        KEEPSAKE_ARCHIVE: archive.name,
        KEEPSAKE_ARCHIVE_PATH: archive.path,
        KEEPSAKE_DESTINATION: ctx.destinationDir,
      },
    });

    if (result.exitCode !== 0) {
      logger.warn(`Notify hook failed (${describeFailure(result)})`);
      return false;
    }

    const output = result.stdout.trim();
    if (output) {
      logger.debug(`Notify hook output: ${output}`);
    }
    return true;
  } catch (err) {
    logger.warn(`Notify hook could not be started: ${errorMessage(err)}`);
    return false;
  }
}
