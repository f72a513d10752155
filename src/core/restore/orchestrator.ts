/**
 * Restore orchestration
 */

import { existsSync } from "node:fs";
import * as path from "node:path";
import type { RestoreResult, RunContext } from "../../types";
import { ensureDestination } from "../catalog";
import { RunGuard, withRunGuard } from "../lock/run-guard";
import { restoreArchive } from "./restore";

export interface RestoreOptions {
  guard?: RunGuard;
}

/**
 * A bare archive name that does not exist relative to the working directory
 * is looked up in the destination.
 */
export function resolveArchivePath(archive: string, ctx: RunContext, cwd: string = process.cwd()): string {
  const direct = path.resolve(cwd, archive);
  if (existsSync(direct) || archive.includes("/") || archive.includes(path.sep)) {
    return direct;
  }
  return path.join(ctx.destinationDir, archive);
}

export async function runRestore(
  ctx: RunContext,
  archivePath: string,
  targetDir: string,
  options: RestoreOptions = {},
): Promise<RestoreResult> {
  const guard = options.guard ?? new RunGuard(ctx.lockPath, { dryRun: ctx.dryRun });

  return withRunGuard(guard, async () => {
    const startTime = Date.now();

    await ensureDestination(ctx);
    await restoreArchive(archivePath, targetDir, ctx);

    return {
      archivePath: path.resolve(archivePath),
      targetDir: path.resolve(targetDir),
      simulated: ctx.dryRun,
      durationMs: Date.now() - startTime,
    };
  });
}
