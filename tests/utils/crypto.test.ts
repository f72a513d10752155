import { rm, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { computeFileChecksum, isChecksumAlgorithm } from "../../src/utils/crypto";
import { makeTempDir } from "../helpers";

describe("crypto utilities", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("crypto");
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("computeFileChecksum", () => {
    test("computes SHA256 checksum of a file", async () => {
      const testFile = path.join(tempDir, "test.txt");
      await writeFile(testFile, "hello world");

      expect(await computeFileChecksum(testFile)).toBe(
        "b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9",
      );
    });

    test("computes MD5 checksum of a file", async () => {
      const testFile = path.join(tempDir, "md5.txt");
      await writeFile(testFile, "hello world");

      expect(await computeFileChecksum(testFile, "md5")).toBe("5eb63bbbe01eeed093cb22bb8f5acdc3");
    });

    test("returns different checksums for different content", async () => {
      const file1 = path.join(tempDir, "file1.txt");
      const file2 = path.join(tempDir, "file2.txt");
      await writeFile(file1, "content 1");
      await writeFile(file2, "content 2");

      expect(await computeFileChecksum(file1)).not.toBe(await computeFileChecksum(file2));
    });

    test("rejects for a missing file", async () => {
      await expect(computeFileChecksum(path.join(tempDir, "missing.txt"))).rejects.toThrow();
    });
  });

  describe("isChecksumAlgorithm", () => {
    test("accepts supported algorithms only", () => {
      expect(isChecksumAlgorithm("sha256")).toBe(true);
      expect(isChecksumAlgorithm("md5")).toBe(true);
      expect(isChecksumAlgorithm("sha1")).toBe(false);
      expect(isChecksumAlgorithm(256)).toBe(false);
    });
  });
});
