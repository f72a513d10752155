/**
 * Archive verification: digest truth plus a structural read of the container
 */

import { mkdtemp, rm } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { ChecksumAlgorithm, RunContext, VerifyOutcome } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { extractTarGz, listTarGz } from "../../utils/tar";
import { listArchives } from "../catalog";
import { errorMessage, isOperationError, OperationError } from "../errors";
import { readDigestRecord } from "./sealer";

/**
 * Attempt a full extraction into a scratch directory, falling back to a
 * listing pass. The scratch directory is always removed.
 */
export async function checkArchiveStructure(archivePath: string): Promise<boolean> {
  const scratch = await mkdtemp(path.join(os.tmpdir(), "keepsake-verify-"));

  try {
    const extracted = await extractTarGz(archivePath, scratch);
    if (extracted.exitCode === 0) return true;

    logger.debug(`Extraction check failed for ${path.basename(archivePath)}, trying a listing pass`);
    const listed = await listTarGz(archivePath);
    return listed.exitCode === 0;
  } finally {
    await rm(scratch, { recursive: true, force: true });
  }
}

/**
 * Verify one archive against its digest record.
 * Rejects with MissingDigest, ChecksumMismatch or CorruptArchive.
 */
export async function verifyArchive(
  archivePath: string,
  recordPath: string,
  algorithm: ChecksumAlgorithm,
): Promise<void> {
  const archiveName = path.basename(archivePath);
  logger.info(`Verifying ${archivePath}`);

  const record = await readDigestRecord(recordPath, algorithm);
  if (!record) {
    throw new OperationError("MissingDigest", `Checksum file not found: ${recordPath}`);
  }

  const current = await computeFileChecksum(archivePath, algorithm);
  if (record.digest !== current) {
    throw new OperationError("ChecksumMismatch", `Checksum mismatch for ${archiveName}`);
  }

  if (!(await checkArchiveStructure(archivePath))) {
    throw new OperationError("CorruptArchive", `Archive appears corrupted: ${archiveName}`);
  }

  logger.success(`Verification successful for ${archiveName}`);
}

/**
 * Verify every archive in the destination. One failure never stops the rest.
 */
export async function verifyDestination(ctx: RunContext, names?: string[]): Promise<VerifyOutcome[]> {
  const entries = await listArchives(ctx.destinationDir, ctx.archivePrefix, ctx.checksumAlgorithm);
  const selected = names ? entries.filter((entry) => names.includes(entry.name)) : entries;
  const outcomes: VerifyOutcome[] = [];

  for (const entry of selected) {
    try {
      await verifyArchive(entry.path, entry.digestPath, entry.digestAlgorithm);
      outcomes.push({ archiveName: entry.name, ok: true });
    } catch (err) {
      if (!isOperationError(err)) {
        logger.error(`Verification of ${entry.name} failed: ${errorMessage(err)}`);
        outcomes.push({ archiveName: entry.name, ok: false, code: "Error", message: errorMessage(err) });
        continue;
      }
      logger.failed(err.message);
      outcomes.push({ archiveName: entry.name, ok: false, code: err.code, message: err.message });
    }
  }

  return outcomes;
}
