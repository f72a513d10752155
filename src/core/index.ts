/**
 * Core module exports
 */

// Backup
export { type BackupOptions, buildArchive, checkFreeSpace, parseExcludePatterns, runBackup } from "./backup";

// Catalog
export { compareEntries, ensureDestination, listArchives } from "./catalog";
export { type ContextOptions, createRunContext } from "./context";

// Errors
export {
  errorMessage,
  isOperationError,
  OperationError,
  type OperationErrorCode,
  VERIFY_ERROR_CODES,
} from "./errors";

// Integrity
export { checkArchiveStructure, readDigestRecord, seal, verifyArchive, verifyDestination } from "./integrity";

// Lock
export { isProcessAlive, readLockOwner, RunGuard, type RunGuardOptions, withRunGuard } from "./lock/run-guard";

// Notify
export { NOTIFY_TIMEOUT_MS, runNotifyHook } from "./notify/hook";

// Restore
export { type RestoreOptions, resolveArchivePath, restoreArchive, runRestore } from "./restore";

// Rotation
export { type PlanOptions, planRotation, type RotateOptions, rotate } from "./rotation";

// Scheduler
export { getNextRun, matchesCron, type ParsedCron, parseCron, Scheduler } from "./scheduler";
