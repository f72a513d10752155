/**
 * Integrity module exports
 */

export { digestRecordPath, formatDigestRecord, readDigestRecord, type SealOptions, seal } from "./sealer";
export { checkArchiveStructure, verifyArchive, verifyDestination } from "./verifier";
