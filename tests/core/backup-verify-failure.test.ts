import { mkdir, readdir, rm, stat, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { runBackup } from "../../src/core/backup/orchestrator";
import { OperationError } from "../../src/core/errors";
import { verifyArchive } from "../../src/core/integrity/verifier";
import { makeTempDir, silenceConsole, spiedLines, testContext, writeArchiveFile } from "../helpers";

vi.mock("../../src/core/integrity/verifier", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/core/integrity/verifier")>();
  return { ...actual, verifyArchive: vi.fn() };
});

const NOW = new Date(2024, 0, 10, 2, 0, 0);
const ARCHIVE_NAME = "backup-2024-01-10-020000.tar.gz";

describe("runBackup with a failing verification", () => {
  let tempDir: string;
  let sourceDir: string;
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(async () => {
    tempDir = await makeTempDir("verify-failure");
    sourceDir = path.join(tempDir, "data");
    await mkdir(sourceDir);
    await writeFile(path.join(sourceDir, "report.txt"), "quarterly numbers");
    consoleSpies = silenceConsole();
    vi.mocked(verifyArchive).mockRejectedValue(
      new OperationError("ChecksumMismatch", `Checksum mismatch for ${ARCHIVE_NAME}`),
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  test("keeps the archive out of rotation and skips the notify hook", async () => {
    const marker = path.join(tempDir, "notified.txt");
    const ctx = testContext(
      tempDir,
      { daily_keep: 1, weekly_keep: 0, monthly_keep: 0, notify_target: `touch '${marker}'` },
      { now: () => NOW },
    );
    await mkdir(ctx.destinationDir);
    await writeArchiveFile(ctx.destinationDir, "backup-2024-01-09-020000.tar.gz");

    const result = await runBackup(ctx, sourceDir);

    expect(result.verified).toBe(false);
    expect(result.verifyError).toBe(`Checksum mismatch for ${ARCHIVE_NAME}`);
    expect(result.notified).toBe(false);
    expect(result.rotation.anomalies).toEqual([
      { archiveName: ARCHIVE_NAME, code: "ChecksumMismatch", message: `Checksum mismatch for ${ARCHIVE_NAME}` },
    ]);
    expect(result.rotation.kept.map((d) => [d.entry.name, d.reason])).toEqual([
      [ARCHIVE_NAME, "retained"],
      ["backup-2024-01-09-020000.tar.gz", "daily"],
    ]);
    expect(result.rotation.deleted).toEqual([]);
    expect((await readdir(ctx.destinationDir)).sort()).toEqual([
      "backup-2024-01-09-020000.tar.gz",
      "backup-2024-01-09-020000.tar.gz.sha256",
      ARCHIVE_NAME,
      `${ARCHIVE_NAME}.sha256`,
    ]);
    await expect(stat(marker)).rejects.toThrow();
    expect(
      spiedLines(consoleSpies.error).some((line) => line.endsWith(`FAILED: Checksum mismatch for ${ARCHIVE_NAME}`)),
    ).toBe(true);
  });
});
