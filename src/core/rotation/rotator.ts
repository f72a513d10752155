/**
 * Rotation orchestration: plan retention for the destination and prune the rest
 */

import { unlink } from "node:fs/promises";
import * as path from "node:path";
import type {
  ArchiveHandle,
  CatalogEntry,
  DeleteDecision,
  RotationAnomaly,
  RotationReport,
  RunContext,
} from "../../types";
import { logger } from "../../utils/logger";
import { digestRecordName, parseArchiveName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";
import { listArchives } from "../catalog";
import { errnoCode, errorMessage } from "../errors";
import { planRotation } from "./retention";

async function removeFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") throw err;
  }
}

/**
 * Delete an archive and then every digest record beside it. Returns false
 * only when the archive itself could not be removed.
 */
async function deleteArchive(decision: DeleteDecision, destDir: string): Promise<boolean> {
  const { entry } = decision;

  if (![entry.path, ...entry.digestPaths].every((filePath) => isPathWithinDir(filePath, destDir))) {
    logger.error(`Refusing to delete ${entry.path}: outside ${destDir}`);
    return false;
  }

  try {
    await removeFile(entry.path);
  } catch (err) {
    logger.error(`Failed to delete ${entry.name}: ${errorMessage(err)}`);
    return false;
  }

  for (const digestPath of entry.digestPaths) {
    try {
      await removeFile(digestPath);
    } catch (err) {
      logger.warn(`Deleted ${entry.name} but not its checksum file ${digestPath}: ${errorMessage(err)}`);
    }
  }

  return true;
}

export interface RotateOptions {
  /**
   * This run's archive when it was only simulated. It joins the listing as if
   * it had been written and sealed, so the plan matches a real run.
   */
  simulated?: ArchiveHandle;
  /** This run's archive when it failed to seal or verify; kept for inspection */
  flawed?: RotationAnomaly;
}

function simulatedEntry(archive: ArchiveHandle, ctx: RunContext): CatalogEntry {
  const digestPath = path.join(ctx.destinationDir, digestRecordName(archive.name, ctx.checksumAlgorithm));
  return {
    name: archive.name,
    path: archive.path,
    sizeBytes: archive.sizeBytes,
    parsed: parseArchiveName(archive.name, ctx.archivePrefix),
    digestPath,
    digestAlgorithm: ctx.checksumAlgorithm,
    digestPaths: [digestPath],
    sealed: true,
  };
}

/**
 * Apply the retention policy to the destination. Per-file failures are
 * logged and reported; they never abort the rotation.
 */
export async function rotate(ctx: RunContext, options: RotateOptions = {}): Promise<RotationReport> {
  const { dailyKeep, weeklyKeep, monthlyKeep } = ctx.retention;
  logger.info(
    `Starting rotation in ${ctx.destinationDir} (daily=${dailyKeep} weekly=${weeklyKeep} monthly=${monthlyKeep})`,
  );

  const entries = await listArchives(ctx.destinationDir, ctx.archivePrefix, ctx.checksumAlgorithm);
  const { simulated, flawed } = options;
  if (simulated && !entries.some((entry) => entry.name === simulated.name)) {
    entries.push(simulatedEntry(simulated, ctx));
  }

  const plan = planRotation(entries, ctx.retention, { retain: flawed ? [flawed.archiveName] : [] });

  const report: RotationReport = {
    kept: plan.kept,
    deleted: [],
    anomalies: [],
    unsealed: [],
    failed: [],
  };

  for (const decision of plan.kept) {
    if (decision.reason === "retained" && flawed) {
      logger.warn(`Keeping ${flawed.archiveName} for inspection: ${flawed.message}`);
      report.anomalies.push(flawed);
    } else if (decision.reason === "unparseable") {
      const message = `Unable to parse timestamp from ${decision.entry.name}; keeping it out of rotation`;
      logger.warn(message);
      report.anomalies.push({ archiveName: decision.entry.name, code: "UnparseableTimestamp", message });
    } else {
      logger.debug(`Keeping ${decision.entry.name} (${decision.reason} ${decision.bucket})`);
      if (!decision.entry.sealed) {
        logger.warn(`Keeping ${decision.entry.name} without a checksum file`);
        report.unsealed.push(decision.entry.name);
      }
    }
  }

  for (const decision of plan.deleted) {
    const why = decision.reason === "unsealed" ? " (no checksum file)" : "";

    if (ctx.dryRun) {
      logger.info(`Dry-run: would delete ${decision.entry.name}${why}`);
      report.deleted.push(decision);
      continue;
    }

    if (await deleteArchive(decision, ctx.destinationDir)) {
      logger.info(`Deleted old backup: ${decision.entry.name}${why}`);
      report.deleted.push(decision);
    } else {
      report.failed.push(decision.entry.name);
    }
  }

  logger.info(`Rotation complete: ${report.kept.length} kept, ${report.deleted.length} deleted`);
  return report;
}
