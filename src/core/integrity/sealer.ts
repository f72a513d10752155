/**
 * Integrity sealing: digest records written beside each archive
 */

import { readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { ChecksumAlgorithm, DigestRecord } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { logger } from "../../utils/logger";
import { digestRecordName } from "../../utils/naming";
import { errnoCode } from "../errors";

export interface SealOptions {
  dryRun?: boolean;
}

export function digestRecordPath(archivePath: string, algorithm: ChecksumAlgorithm): string {
  return path.join(path.dirname(archivePath), digestRecordName(path.basename(archivePath), algorithm));
}

export function formatDigestRecord(digest: string, archiveName: string): string {
  return `${digest}  ${archiveName}\n`;
}

/**
 * Compute the archive digest and persist it as `<archive>.<algorithm>`.
 * In dry-run mode nothing is read or written and the digest is empty.
 */
export async function seal(
  archivePath: string,
  algorithm: ChecksumAlgorithm,
  options: SealOptions = {},
): Promise<DigestRecord> {
  const archiveName = path.basename(archivePath);
  const recordPath = digestRecordPath(archivePath, algorithm);

  if (options.dryRun) {
    logger.info(`Dry-run: would write checksum to ${recordPath} using ${algorithm}`);
    return { path: recordPath, archiveName, algorithm, digest: "" };
  }

  const digest = await computeFileChecksum(archivePath, algorithm);
  await writeFile(recordPath, formatDigestRecord(digest, archiveName));
  logger.info(`Checksum (${algorithm}) saved to ${path.basename(recordPath)}`);

  return { path: recordPath, archiveName, algorithm, digest };
}

/**
 * Read a digest record. Returns null when the file does not exist.
 */
export async function readDigestRecord(
  recordPath: string,
  algorithm: ChecksumAlgorithm,
): Promise<DigestRecord | null> {
  let content: string;
  try {
    content = await readFile(recordPath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }

  const [digest = "", archiveName = ""] = content.trim().split(/\s+/);
  return {
    path: recordPath,
    archiveName: archiveName.replace(/^\*/, ""),
    algorithm,
    digest: digest.toLowerCase(),
  };
}
