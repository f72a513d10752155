/**
 * Path validation and filesystem probes
 */

import { statfs } from "node:fs/promises";
import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return normalizedPath.startsWith(normalizedDir + path.sep) || normalizedPath === normalizedDir;
}

/**
 * Available space for unprivileged users on the filesystem holding `dirPath`,
 * in whole mebibytes. Resolves null when the filesystem cannot be queried.
 */
export async function getAvailableSpaceMb(dirPath: string): Promise<number | null> {
  try {
    const stats = await statfs(dirPath);
    return Math.floor((stats.bavail * stats.bsize) / (1024 * 1024));
  } catch {
    return null;
  }
}
