/**
 * Centralized type exports for keepsake
 */

// Backup types
export type {
  ArchiveHandle,
  BackupResult,
  CatalogEntry,
  DeleteDecision,
  DeleteReason,
  DigestRecord,
  KeepDecision,
  KeepReason,
  RestoreResult,
  RotationDecision,
  RotationAnomaly,
  RotationPlan,
  RotationReport,
  RunContext,
  VerifyOutcome,
} from "./backup";
// Config types
export type {
  ChecksumAlgorithm,
  KeepsakeSettings,
  LoadedSettings,
  RetentionPolicy,
  SettingsKey,
} from "./config";
