/**
 * Backup lifecycle type definitions
 */

import type { OperationErrorCode } from "../core/errors";
import type { ParsedArchiveName } from "../utils/naming";
import type { ChecksumAlgorithm, RetentionPolicy } from "./config";

/**
 * Everything a pipeline step needs for one invocation.
 */
export interface RunContext {
  destinationDir: string;
  archivePrefix: string;
  excludePatterns: string[];
  checksumAlgorithm: ChecksumAlgorithm;
  retention: RetentionPolicy;
  minFreeMb: number;
  lockPath: string;
  notifyTarget: string | null;
  /** Simulate-only mode: narrate every mutating action without performing it */
  dryRun: boolean;
  now: () => Date;
}

export interface ArchiveHandle {
  name: string;
  path: string;
  createdAt: Date;
  /** 0 when simulated */
  sizeBytes: number;
  simulated: boolean;
}

export interface DigestRecord {
  path: string;
  archiveName: string;
  algorithm: ChecksumAlgorithm;
  digest: string;
}

export interface CatalogEntry {
  name: string;
  path: string;
  sizeBytes: number;
  /** null when the name carries no valid timestamp */
  parsed: ParsedArchiveName | null;
  /** Digest record to verify against: the configured algorithm's when present, else the first one found */
  digestPath: string;
  digestAlgorithm: ChecksumAlgorithm;
  /** Every digest record present beside the archive, whatever its algorithm */
  digestPaths: string[];
  sealed: boolean;
}

export type KeepReason = "daily" | "weekly" | "monthly" | "unparseable" | "retained";

export type DeleteReason = "expired" | "unsealed";

export type RotationDecision =
  | { entry: CatalogEntry; action: "keep"; reason: KeepReason; bucket: string | null }
  | { entry: CatalogEntry; action: "delete"; reason: DeleteReason };

export type KeepDecision = Extract<RotationDecision, { action: "keep" }>;
export type DeleteDecision = Extract<RotationDecision, { action: "delete" }>;

export interface RotationPlan {
  decisions: RotationDecision[];
  kept: KeepDecision[];
  deleted: DeleteDecision[];
}

/**
 * An archive kept out of rotation: its name has no usable timestamp, or it is
 * this run's archive and failed to seal or verify.
 */
export interface RotationAnomaly {
  archiveName: string;
  code: OperationErrorCode;
  message: string;
}

export interface RotationReport {
  kept: KeepDecision[];
  deleted: DeleteDecision[];
  anomalies: RotationAnomaly[];
  /** Names kept by bucket rules although their digest record is missing */
  unsealed: string[];
  /** Names whose archive could not be removed */
  failed: string[];
}

export type VerifyOutcome =
  | { archiveName: string; ok: true }
  | { archiveName: string; ok: false; code: string; message: string };

export interface BackupResult {
  archive: ArchiveHandle;
  digest: DigestRecord | null;
  verified: boolean;
  verifyError: string | null;
  rotation: RotationReport;
  notified: boolean;
  durationMs: number;
}

export interface RestoreResult {
  archivePath: string;
  targetDir: string;
  simulated: boolean;
  durationMs: number;
}
