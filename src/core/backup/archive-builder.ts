/**
 * Archive creation for backups
 */

import { constants } from "node:fs";
import { access, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import type { ArchiveHandle, RunContext } from "../../types";
import { logger } from "../../utils/logger";
import { generateArchiveName } from "../../utils/naming";
import { getAvailableSpaceMb, isPathWithinDir } from "../../utils/path";
import { describeFailure } from "../../utils/shell";
import { createArgs, createTarGz, TAR_COMMAND } from "../../utils/tar";
import { errnoCode, errorMessage, fromFsError, OperationError } from "../errors";

/**
 * Split a comma-separated exclude list; entries are trimmed and empties dropped.
 */
export function parseExcludePatterns(list: string): string[] {
  return list
    .split(",")
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0);
}

async function assertReadableDirectory(sourceDir: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(sourceDir)).isDirectory();
  } catch (err) {
    throw fromFsError(err, `source folder ${sourceDir}`);
  }

  if (!isDirectory) {
    throw new OperationError("NotFound", `Source folder not found: ${sourceDir}`);
  }

  try {
    await access(sourceDir, constants.R_OK | constants.X_OK);
  } catch (err) {
    throw new OperationError("PermissionDenied", `Cannot read folder (permission denied): ${sourceDir}`, {
      cause: err,
    });
  }
}

/**
 * Advisory free-space check. An unknown amount of space is a warning, not a failure.
 */
export async function checkFreeSpace(destDir: string, minFreeMb: number): Promise<void> {
  if (minFreeMb <= 0) return;

  const available = await getAvailableSpaceMb(destDir);
  if (available === null) {
    logger.warn(`Unable to determine free space for ${destDir}`);
    return;
  }

  if (available < minFreeMb) {
    throw new OperationError(
      "InsufficientSpace",
      `Not enough disk space in ${destDir} (need ${minFreeMb} MB, ${available} MB available)`,
    );
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw err;
  }
}

/**
 * Package `sourceDir` as `<prefix>-YYYY-MM-DD-HHMMSS.tar.gz` in the destination.
 * The source directory itself is the archive's single top-level member.
 */
export async function buildArchive(sourceDir: string, ctx: RunContext): Promise<ArchiveHandle> {
  const source = path.resolve(sourceDir);
  const createdAt = ctx.now();
  const name = generateArchiveName(ctx.archivePrefix, createdAt);
  const archivePath = path.join(ctx.destinationDir, name);

  logger.info(`Starting backup of ${source} -> ${archivePath}`);

  await assertReadableDirectory(source);
  await checkFreeSpace(ctx.destinationDir, ctx.minFreeMb);

  const parentDir = path.dirname(source);
  const entry = path.basename(source);
  const excludes = [...ctx.excludePatterns];
  if (isPathWithinDir(ctx.destinationDir, source)) {
    // never archive the destination into itself
    const relative = path.relative(source, ctx.destinationDir);
    excludes.push(path.join(entry, relative || `${ctx.archivePrefix}-*`));
  }

  if (ctx.dryRun) {
    const command = [TAR_COMMAND, ...createArgs(archivePath, parentDir, entry, excludes)].join(" ");
    logger.info(`Dry-run: would run: ${command}`);
    return { name, path: archivePath, createdAt, sizeBytes: 0, simulated: true };
  }

  if (await exists(archivePath)) {
    throw new OperationError("BuildError", `Archive ${name} already exists; refusing to overwrite it`);
  }

  logger.debug(`Excluding: ${excludes.join(", ") || "(nothing)"}`);

  let failure: string | null = null;
  let cause: unknown;
  try {
    const result = await createTarGz(archivePath, parentDir, entry, excludes);
    if (result.exitCode !== 0) {
      failure = describeFailure(result);
    }
  } catch (err) {
    failure = errorMessage(err);
    cause = err;
  }

  if (failure !== null) {
    await rm(archivePath, { force: true }).catch((err: unknown) => {
      logger.warn(`Could not remove partial archive ${archivePath}: ${errorMessage(err)}`);
    });
    throw new OperationError("BuildError", `Tar failed while creating ${archivePath}: ${failure}`, { cause });
  }

  const { size } = await stat(archivePath);
  logger.success(`Backup created: ${name}`);

  return { name, path: archivePath, createdAt, sizeBytes: size, simulated: false };
}
