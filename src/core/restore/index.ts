/**
 * Restore module exports
 */

export { type RestoreOptions, resolveArchivePath, runRestore } from "./orchestrator";
export { restoreArchive } from "./restore";
