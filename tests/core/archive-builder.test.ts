import { mkdir, readdir, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { buildArchive, parseExcludePatterns } from "../../src/core/backup/archive-builder";
import { errorMessage, isOperationError } from "../../src/core/errors";
import { listTarGz } from "../../src/utils/tar";
import { makeTempDir, silenceConsole, spiedLines, testContext } from "../helpers";

const NOW = new Date(2024, 0, 10, 2, 0, 0);
const ARCHIVE_NAME = "backup-2024-01-10-020000.tar.gz";

describe("archive builder", () => {
  let tempDir: string;
  let sourceDir: string;
  let consoleSpies: ReturnType<typeof silenceConsole>;

  async function members(archivePath: string): Promise<string[]> {
    const result = await listTarGz(archivePath);
    expect(result.exitCode).toBe(0);
    return result.stdout
      .split("\n")
      .filter((line) => line.length > 0)
      .map((line) => line.replace(/\/$/, ""));
  }

  async function codeOf(promise: Promise<unknown>): Promise<string> {
    const err = await promise.then(
      () => null,
      (e: unknown) => e,
    );
    return isOperationError(err) ? err.code : `unexpected: ${errorMessage(err)}`;
  }

  beforeEach(async () => {
    tempDir = await makeTempDir("builder");
    sourceDir = path.join(tempDir, "data");
    await mkdir(path.join(sourceDir, "docs"), { recursive: true });
    await mkdir(path.join(sourceDir, ".git"));
    await mkdir(path.join(sourceDir, "node_modules"));
    await writeFile(path.join(sourceDir, "docs", "readme.txt"), "hello");
    await writeFile(path.join(sourceDir, ".git", "HEAD"), "ref: refs/heads/main");
    await writeFile(path.join(sourceDir, "node_modules", "index.js"), "module.exports = 1;");
    consoleSpies = silenceConsole();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("parseExcludePatterns", () => {
    test("splits, trims and drops empty entries", () => {
      expect(parseExcludePatterns(" .git, ,node_modules ,*.tmp")).toEqual([".git", "node_modules", "*.tmp"]);
      expect(parseExcludePatterns("")).toEqual([]);
    });
  });

  describe("buildArchive", () => {
    test("archives the source folder as the single top-level member", async () => {
      const ctx = testContext(tempDir, {}, { now: () => NOW });
      await mkdir(ctx.destinationDir);

      const handle = await buildArchive(sourceDir, ctx);

      expect(handle.name).toBe(ARCHIVE_NAME);
      expect(handle.path).toBe(path.join(ctx.destinationDir, ARCHIVE_NAME));
      expect(handle.createdAt).toBe(NOW);
      expect(handle.simulated).toBe(false);
      expect(handle.sizeBytes).toBe((await stat(handle.path)).size);

      const entries = await members(handle.path);
      expect(entries).toContain("data/docs/readme.txt");
      expect(entries.every((entry) => entry === "data" || entry.startsWith("data/"))).toBe(true);
    });

    test("applies the exclude patterns", async () => {
      const ctx = testContext(tempDir, { exclude_patterns: ".git,node_modules" }, { now: () => NOW });
      await mkdir(ctx.destinationDir);

      const entries = await members((await buildArchive(sourceDir, ctx)).path);

      expect(entries.some((entry) => entry.includes(".git"))).toBe(false);
      expect(entries.some((entry) => entry.includes("node_modules"))).toBe(false);
    });

    test("keeps everything when no patterns are configured", async () => {
      const ctx = testContext(tempDir, { exclude_patterns: "" }, { now: () => NOW });
      await mkdir(ctx.destinationDir);

      const entries = await members((await buildArchive(sourceDir, ctx)).path);

      expect(entries).toContain("data/.git/HEAD");
      expect(entries).toContain("data/node_modules/index.js");
    });

    test("never archives a destination that lives inside the source", async () => {
      const destinationDir = path.join(sourceDir, "backups");
      const ctx = testContext(tempDir, { destination_dir: destinationDir }, { now: () => NOW });
      await mkdir(destinationDir);
      await writeFile(path.join(destinationDir, "backup-2024-01-09-020000.tar.gz"), "older archive");

      const entries = await members((await buildArchive(sourceDir, ctx)).path);

      expect(entries.some((entry) => entry.startsWith("data/backups"))).toBe(false);
      expect(entries).toContain("data/docs/readme.txt");
    });

    test("fails with NotFound for a missing source", async () => {
      const ctx = testContext(tempDir, {}, { now: () => NOW });
      await mkdir(ctx.destinationDir);

      expect(await codeOf(buildArchive(path.join(tempDir, "missing"), ctx))).toBe("NotFound");
      expect(await readdir(ctx.destinationDir)).toEqual([]);
    });

    test("fails with NotFound when the source is a file", async () => {
      const ctx = testContext(tempDir, {}, { now: () => NOW });
      await mkdir(ctx.destinationDir);

      expect(await codeOf(buildArchive(path.join(sourceDir, "docs", "readme.txt"), ctx))).toBe("NotFound");
    });

    test("fails with InsufficientSpace below the free-space floor", async () => {
      const ctx = testContext(tempDir, { min_free_mb: 10 ** 12 }, { now: () => NOW });
      await mkdir(ctx.destinationDir);

      expect(await codeOf(buildArchive(sourceDir, ctx))).toBe("InsufficientSpace");
      expect(await readdir(ctx.destinationDir)).toEqual([]);
    });

    test("refuses to overwrite an archive with the same name", async () => {
      const ctx = testContext(tempDir, {}, { now: () => NOW });
      await mkdir(ctx.destinationDir);
      await writeFile(path.join(ctx.destinationDir, ARCHIVE_NAME), "existing");

      expect(await codeOf(buildArchive(sourceDir, ctx))).toBe("BuildError");
    });

    test("only narrates the tar command in dry-run mode", async () => {
      const ctx = testContext(tempDir, { exclude_patterns: ".git" }, { dryRun: true, now: () => NOW });

      const handle = await buildArchive(sourceDir, ctx);

      expect(handle).toEqual({
        name: ARCHIVE_NAME,
        path: path.join(ctx.destinationDir, ARCHIVE_NAME),
        createdAt: NOW,
        sizeBytes: 0,
        simulated: true,
      });
      await expect(stat(ctx.destinationDir)).rejects.toThrow();
      expect(
        spiedLines(consoleSpies.log).some((line) =>
          line.endsWith(
            `Dry-run: would run: tar -czf ${path.join(ctx.destinationDir, ARCHIVE_NAME)} --exclude=.git -C ${tempDir} data`,
          ),
        ),
      ).toBe(true);
    });
  });
});
