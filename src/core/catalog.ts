/**
 * Destination catalog: the archives currently present, newest first
 */

import type { Stats } from "node:fs";
import { mkdir, readdir, stat } from "node:fs/promises";
import * as path from "node:path";
import type { CatalogEntry, ChecksumAlgorithm, RunContext } from "../types";
import { logger } from "../utils/logger";
import { CHECKSUM_ALGORITHMS } from "../utils/crypto";
import { ARCHIVE_EXTENSION, digestRecordName, isArchiveCandidate, parseArchiveName } from "../utils/naming";
import { errnoCode, fromFsError, OperationError } from "./errors";

function descending(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}

/**
 * Newest first by embedded timestamp; unparseable names sort after all
 * parseable ones, in reverse name order.
 */
export function compareEntries(a: CatalogEntry, b: CatalogEntry): number {
  if (a.parsed && b.parsed) {
    const byTimestamp = descending(a.parsed.timestamp, b.parsed.timestamp);
    return byTimestamp !== 0 ? byTimestamp : descending(a.name, b.name);
  }
  if (a.parsed) return -1;
  if (b.parsed) return 1;
  return descending(a.name, b.name);
}

/**
 * Enumerate archive files directly inside `destDir` that match
 * `<prefix>-*<ext>`. An archive is sealed when a digest record of any
 * supported algorithm sits beside it. A missing destination has no archives.
 */
export async function listArchives(
  destDir: string,
  prefix: string,
  algorithm: ChecksumAlgorithm,
  ext: string = ARCHIVE_EXTENSION,
): Promise<CatalogEntry[]> {
  let names: string[];
  try {
    names = await readdir(destDir);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return [];
    throw err;
  }

  const present = new Set(names);
  const entries: CatalogEntry[] = [];

  for (const name of names) {
    if (!isArchiveCandidate(name, prefix, ext)) continue;

    const filePath = path.join(destDir, name);
    let stats: Stats;
    try {
      stats = await stat(filePath);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") continue;
      throw err;
    }
    if (!stats.isFile()) continue;

    // a record written under an earlier checksum_algo still seals the archive
    const recorded = CHECKSUM_ALGORITHMS.filter((candidate) => present.has(digestRecordName(name, candidate)));
    const digestAlgorithm = recorded.includes(algorithm) ? algorithm : (recorded[0] ?? algorithm);

    entries.push({
      name,
      path: filePath,
      sizeBytes: stats.size,
      parsed: parseArchiveName(name, prefix, ext),
      digestPath: path.join(destDir, digestRecordName(name, digestAlgorithm)),
      digestAlgorithm,
      digestPaths: recorded.map((candidate) => path.join(destDir, digestRecordName(name, candidate))),
      sealed: recorded.length > 0,
    });
  }

  return entries.sort(compareEntries);
}

/**
 * Create the destination directory when it does not exist yet.
 */
export async function ensureDestination(ctx: RunContext): Promise<void> {
  let existing: Stats | null = null;
  try {
    existing = await stat(ctx.destinationDir);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") throw err;
  }

  if (existing) {
    if (existing.isDirectory()) return;
    throw new OperationError("NotFound", `Backup destination ${ctx.destinationDir} is not a directory`);
  }

  if (ctx.dryRun) {
    logger.info(`Dry-run: would create backup destination ${ctx.destinationDir}`);
    return;
  }

  try {
    await mkdir(ctx.destinationDir, { recursive: true });
  } catch (err) {
    throw fromFsError(err, `backup destination ${ctx.destinationDir}`);
  }
  logger.info(`Created backup destination ${ctx.destinationDir}`);
}
