/**
 * Backup orchestration
 */

import type { BackupResult, DigestRecord, RotationAnomaly, RunContext } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { ensureDestination } from "../catalog";
import { errorMessage, isOperationError, VERIFY_ERROR_CODES } from "../errors";
import { seal } from "../integrity/sealer";
import { verifyArchive } from "../integrity/verifier";
import { RunGuard, withRunGuard } from "../lock/run-guard";
import { runNotifyHook } from "../notify/hook";
import { rotate } from "../rotation/rotator";
import { buildArchive } from "./archive-builder";

export interface BackupOptions {
  /** Guard to run under; one is created from the context's lock path otherwise */
  guard?: RunGuard;
}

/**
 * Run the whole backup pipeline under the run guard:
 * build, seal, verify, rotate, notify.
 *
 * Build failures abort the run. Verification failures are logged and
 * reported, the archive stays on disk, and rotation still runs.
 */
export async function runBackup(
  ctx: RunContext,
  sourceDir: string,
  options: BackupOptions = {},
): Promise<BackupResult> {
  const guard = options.guard ?? new RunGuard(ctx.lockPath, { dryRun: ctx.dryRun });

  return withRunGuard(guard, async () => {
    const startTime = Date.now();

    await ensureDestination(ctx);

    const archive = await buildArchive(sourceDir, ctx);

    let digest: DigestRecord | null = null;
    let verified = false;
    let verifyError: string | null = null;
    let flawed: RotationAnomaly | undefined;

    if (archive.simulated) {
      digest = await seal(archive.path, ctx.checksumAlgorithm, { dryRun: true });
      logger.info(`Dry-run: would verify ${archive.name}`);
      verified = true;
    } else {
      try {
        digest = await seal(archive.path, ctx.checksumAlgorithm);
        await verifyArchive(archive.path, digest.path, ctx.checksumAlgorithm);
        verified = true;
      } catch (err) {
        if (isOperationError(err) && VERIFY_ERROR_CODES.has(err.code)) {
          verifyError = err.message;
          flawed = { archiveName: archive.name, code: err.code, message: err.message };
        } else {
          // sealing failed outright, so there is no digest record
          verifyError = `Sealing failed for ${archive.name}: ${errorMessage(err)}`;
          flawed = { archiveName: archive.name, code: "MissingDigest", message: verifyError };
        }
        logger.failed(verifyError);
      }
    }

    // a flawed archive stays on disk for inspection whatever the policy says
    const rotation = await rotate(ctx, archive.simulated ? { simulated: archive } : { flawed });

    const notified = verified ? await runNotifyHook(ctx, archive) : false;

    const durationMs = Date.now() - startTime;
    logger.info(
      `Backup ${archive.simulated ? "simulated" : "finished"}: ${archive.name} ` +
        `(${formatBytes(archive.sizeBytes)}) in ${formatDuration(durationMs)}`,
    );

    return { archive, digest, verified, verifyError, rotation, notified, durationMs };
  });
}
