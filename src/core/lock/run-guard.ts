/**
 * Exclusive run guard
 *
 * A pid file at a well-known path marks the one process allowed to mutate the
 * destination tree. The lock is advisory: processes that do not go through
 * RunGuard are not stopped from touching the destination.
 */

import { linkSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "node:fs";
import * as path from "node:path";
import { logger } from "../../utils/logger";
import { errnoCode, errorMessage, OperationError } from "../errors";

export interface RunGuardOptions {
  dryRun?: boolean;
  /** Process identifier written to the lock; defaults to this process */
  pid?: number;
  /** Liveness probe for a recorded owner */
  isAlive?: (pid: number) => boolean;
}

/**
 * Whether a process with this pid currently exists.
 * EPERM means it exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;

  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return errnoCode(err) === "EPERM";
  }
}

/**
 * Read the owner recorded in a lock file.
 * Returns null when the lock is absent or holds no usable pid.
 */
export function readLockOwner(lockPath: string): number | null {
  let content: string;
  try {
    content = readFileSync(lockPath, "utf8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }

  const trimmed = content.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return Number.parseInt(trimmed, 10);
}

export class RunGuard {
  readonly lockPath: string;
  private readonly dryRun: boolean;
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;
  private held = false;

  constructor(lockPath: string, options: RunGuardOptions = {}) {
    this.lockPath = lockPath;
    this.dryRun = options.dryRun ?? false;
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
  }

  get isHeld(): boolean {
    return this.held;
  }

  /**
   * Take the lock, reclaiming it from a dead owner.
   * Throws LockHeld when a live process owns it; callers must abort, not retry.
   *
   * Synchronous so that no other step of this process can interleave between
   * the liveness check and the write.
   */
  acquire(): void {
    if (this.held) return;

    const owner = this.readOwnerOrStale();
    if (owner !== null && this.isAlive(owner)) {
      throw new OperationError(
        "LockHeld",
        `Lockfile ${this.lockPath} exists and process ${owner} is running`,
      );
    }

    if (owner !== null || this.lockExists()) {
      if (this.dryRun) {
        logger.warn(`Dry-run: would remove stale lockfile ${this.lockPath}`);
      } else {
        logger.warn(`Removing stale lockfile ${this.lockPath}`);
        this.reclaimStale(owner);
      }
    }

    if (this.dryRun) {
      logger.info(`Dry-run: would create lockfile ${this.lockPath}`);
      this.held = true;
      return;
    }

    mkdirSync(path.dirname(this.lockPath), { recursive: true });
    try {
      // wx: a process that created the lock since the reclaim wins
      writeFileSync(this.lockPath, `${this.pid}\n`, { flag: "wx" });
    } catch (err) {
      if (errnoCode(err) === "EEXIST") {
        throw new OperationError("LockHeld", `Lockfile ${this.lockPath} was taken by another process`, {
          cause: err,
        });
      }
      throw err;
    }

    this.held = true;
    logger.info(`Created lockfile ${this.lockPath} (pid ${this.pid})`);
  }

  /**
   * Remove the lock if, and only if, it records this guard's pid.
   * Safe to call repeatedly and from exit or signal handlers.
   */
  release(): void {
    if (!this.held) return;
    this.held = false;

    if (this.dryRun) return;

    let owner: number | null;
    try {
      owner = readLockOwner(this.lockPath);
    } catch (err) {
      logger.warn(`Cannot read lockfile ${this.lockPath}: ${errorMessage(err)}`);
      return;
    }

    if (owner !== this.pid) {
      if (owner !== null) {
        logger.warn(`Lockfile ${this.lockPath} now belongs to pid ${owner}, leaving it in place`);
      }
      return;
    }

    try {
      this.removeLockFile();
      logger.info(`Removed lockfile ${this.lockPath}`);
    } catch (err) {
      logger.warn(`Failed to remove lockfile ${this.lockPath}: ${errorMessage(err)}`);
    }
  }

  private readOwnerOrStale(lockPath: string = this.lockPath): number | null {
    try {
      return readLockOwner(lockPath);
    } catch (err) {
      logger.warn(`Cannot read lockfile ${lockPath}: ${errorMessage(err)}`);
      return null;
    }
  }

  /**
   * Move the stale lock aside under a name unique to this process, so that of
   * several processes reclaiming the same lock exactly one rename succeeds.
   * If what was moved is no longer the stale owner's lock, another process
   * reclaimed first: its lock is put back and this acquire fails.
   */
  private reclaimStale(staleOwner: number | null): void {
    const aside = `${this.lockPath}.${this.pid}.stale`;

    try {
      renameSync(this.lockPath, aside);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        throw new OperationError("LockHeld", `Lockfile ${this.lockPath} was reclaimed by another process`, {
          cause: err,
        });
      }
      throw err;
    }

    const moved = this.readOwnerOrStale(aside);
    if (moved !== staleOwner) {
      try {
        linkSync(aside, this.lockPath);
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") throw err;
      }
      unlinkSync(aside);
      throw new OperationError(
        "LockHeld",
        `Lockfile ${this.lockPath} was reclaimed by process ${moved ?? "unknown"}`,
      );
    }

    unlinkSync(aside);
  }

  private lockExists(): boolean {
    try {
      readFileSync(this.lockPath);
      return true;
    } catch (err) {
      return errnoCode(err) !== "ENOENT";
    }
  }

  private removeLockFile(): void {
    try {
      unlinkSync(this.lockPath);
    } catch (err) {
      if (errnoCode(err) !== "ENOENT") throw err;
    }
  }
}

const GUARDED_SIGNALS = [
  { signal: "SIGINT", exitCode: 130 },
  { signal: "SIGTERM", exitCode: 143 },
  { signal: "SIGHUP", exitCode: 129 },
] as const;

/**
 * Run `fn` while holding the guard. The lock is released when `fn` settles,
 * on process exit, and on SIGINT/SIGTERM/SIGHUP before the process terminates.
 */
export async function withRunGuard<T>(guard: RunGuard, fn: () => Promise<T>): Promise<T> {
  guard.acquire();

  const onExit = (): void => guard.release();
  const signalHandlers = GUARDED_SIGNALS.map(({ signal, exitCode }) => {
    const handler = (): void => {
      logger.error(`Received ${signal}, aborting`);
      guard.release();
      process.exit(exitCode);
    };
    process.once(signal, handler);
    return { signal, handler };
  });
  process.once("exit", onExit);

  try {
    return await fn();
  } finally {
    guard.release();
    process.removeListener("exit", onExit);
    for (const { signal, handler } of signalHandlers) {
      process.removeListener(signal, handler);
    }
  }
}
