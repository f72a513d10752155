/**
 * Archive extraction into a target directory
 */

import { mkdir, stat } from "node:fs/promises";
import * as path from "node:path";
import type { RunContext } from "../../types";
import { logger } from "../../utils/logger";
import { describeFailure } from "../../utils/shell";
import { extractTarGz } from "../../utils/tar";
import { errnoCode, errorMessage, OperationError } from "../errors";

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return false;
    throw err;
  }
}

async function assertArchiveExists(archivePath: string): Promise<void> {
  try {
    if ((await stat(archivePath)).isFile()) return;
  } catch (err) {
    if (errnoCode(err) !== "ENOENT" && errnoCode(err) !== "ENOTDIR") throw err;
  }
  throw new OperationError("NotFound", `Restore file not found: ${archivePath}`);
}

/**
 * Extract every member of `archivePath` into `targetDir`, overwriting
 * colliding entries. The target is created when absent.
 */
export async function restoreArchive(archivePath: string, targetDir: string, ctx: RunContext): Promise<void> {
  const archive = path.resolve(archivePath);
  const target = path.resolve(targetDir);

  await assertArchiveExists(archive);

  if (!(await isDirectory(target))) {
    if (ctx.dryRun) {
      logger.info(`Dry-run: would create restore target ${target}`);
    } else {
      try {
        await mkdir(target, { recursive: true });
      } catch (err) {
        throw new OperationError("ExtractFailed", `Cannot create restore target ${target}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }
  }

  if (ctx.dryRun) {
    logger.info(`Dry-run: would extract ${archive} to ${target}`);
    return;
  }

  let failure: string | null = null;
  let cause: unknown;
  try {
    const result = await extractTarGz(archive, target);
    if (result.exitCode !== 0) {
      failure = describeFailure(result);
    }
  } catch (err) {
    failure = errorMessage(err);
    cause = err;
  }

  if (failure !== null) {
    throw new OperationError("ExtractFailed", `Failed to extract ${archive} to ${target}: ${failure}`, { cause });
  }

  logger.success(`Restored ${archive} -> ${target}`);
}
