/**
 * Backup module exports
 */

export { buildArchive, checkFreeSpace, parseExcludePatterns } from "./archive-builder";
export { type BackupOptions, runBackup } from "./orchestrator";
