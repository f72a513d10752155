/**
 * gzip-compressed tar operations through the system tar binary
 */

import { type RunResult, run } from "./shell";

export const TAR_COMMAND = "tar";

function buildExcludeArgs(patterns: string[]): string[] {
  return patterns.map((pattern) => `--exclude=${pattern}`);
}

/**
 * Arguments that archive `entry` (resolved from `parentDir`) as the single
 * top-level member of `archivePath`.
 */
export function createArgs(archivePath: string, parentDir: string, entry: string, excludes: string[]): string[] {
  return ["-czf", archivePath, ...buildExcludeArgs(excludes), "-C", parentDir, entry];
}

export function createTarGz(
  archivePath: string,
  parentDir: string,
  entry: string,
  excludes: string[],
): Promise<RunResult> {
  return run(TAR_COMMAND, createArgs(archivePath, parentDir, entry, excludes));
}

export function extractTarGz(archivePath: string, targetDir: string): Promise<RunResult> {
  return run(TAR_COMMAND, ["-xzf", archivePath, "-C", targetDir]);
}

export function listTarGz(archivePath: string): Promise<RunResult> {
  return run(TAR_COMMAND, ["-tzf", archivePath]);
}
