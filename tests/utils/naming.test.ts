import { describe, expect, test } from "vitest";
import {
  archiveDate,
  bucketKeys,
  digestRecordName,
  formatArchiveTimestamp,
  generateArchiveName,
  isArchiveCandidate,
  isoWeek,
  parseArchiveName,
  parseArchiveTimestamp,
} from "../../src/utils/naming";

describe("naming utilities", () => {
  describe("generateArchiveName", () => {
    test("embeds a zero-padded local timestamp", () => {
      const date = new Date(2024, 0, 10, 2, 3, 4);
      expect(generateArchiveName("backup", date)).toBe("backup-2024-01-10-020304.tar.gz");
    });

    test("uses the given prefix and extension", () => {
      const date = new Date(2023, 11, 31, 23, 59, 59);
      expect(generateArchiveName("nightly", date, ".tgz")).toBe("nightly-2023-12-31-235959.tgz");
    });

    test("defaults the prefix to backup", () => {
      expect(generateArchiveName(undefined, new Date(2024, 5, 1, 0, 0, 0))).toBe("backup-2024-06-01-000000.tar.gz");
    });
  });

  describe("parseArchiveName", () => {
    test("reads back a generated name", () => {
      const date = new Date(2024, 1, 29, 14, 30, 15);
      const parsed = parseArchiveName(generateArchiveName("backup", date));

      expect(parsed).toEqual({
        prefix: "backup",
        timestamp: "2024-02-29-143015",
        year: 2024,
        month: 2,
        day: 29,
        hour: 14,
        minute: 30,
        second: 15,
      });
      expect(parsed && archiveDate(parsed).getTime()).toBe(date.getTime());
    });

    test("rejects names with another prefix", () => {
      expect(parseArchiveName("other-2024-01-10-020000.tar.gz")).toBeNull();
    });

    test("rejects timestamps that are not calendar dates", () => {
      expect(parseArchiveName("backup-2023-02-29-020000.tar.gz")).toBeNull();
      expect(parseArchiveName("backup-2024-13-01-020000.tar.gz")).toBeNull();
      expect(parseArchiveName("backup-2024-04-31-020000.tar.gz")).toBeNull();
      expect(parseArchiveName("backup-2024-01-10-240000.tar.gz")).toBeNull();
    });

    test("rejects free-form suffixes", () => {
      expect(parseArchiveName("backup-latest.tar.gz")).toBeNull();
      expect(parseArchiveName("backup-2024-01-10.tar.gz")).toBeNull();
    });
  });

  describe("parseArchiveTimestamp", () => {
    test("accepts a leap day", () => {
      expect(parseArchiveTimestamp("2024-02-29-000000")?.day).toBe(29);
    });

    test("rejects malformed segments", () => {
      expect(parseArchiveTimestamp("2024-1-10-020000")).toBeNull();
      expect(parseArchiveTimestamp("")).toBeNull();
    });
  });

  describe("isArchiveCandidate", () => {
    test("matches prefix and extension regardless of timestamp", () => {
      expect(isArchiveCandidate("backup-latest.tar.gz")).toBe(true);
      expect(isArchiveCandidate("backup-2024-01-10-020000.tar.gz")).toBe(true);
    });

    test("rejects other files", () => {
      expect(isArchiveCandidate("backup-2024-01-10-020000.tar.gz.sha256")).toBe(false);
      expect(isArchiveCandidate("notes.txt")).toBe(false);
      expect(isArchiveCandidate("backup-.tar.gz")).toBe(false);
    });
  });

  describe("digestRecordName", () => {
    test("appends the algorithm as an extension", () => {
      expect(digestRecordName("backup-2024-01-10-020000.tar.gz", "sha256")).toBe(
        "backup-2024-01-10-020000.tar.gz.sha256",
      );
      expect(digestRecordName("backup-2024-01-10-020000.tar.gz", "md5")).toBe("backup-2024-01-10-020000.tar.gz.md5");
    });
  });

  describe("formatArchiveTimestamp", () => {
    test("formats local time", () => {
      expect(formatArchiveTimestamp(new Date(2024, 8, 5, 7, 8, 9))).toBe("2024-09-05-070809");
    });
  });

  describe("isoWeek", () => {
    test("assigns early January days to the previous week-year", () => {
      expect(isoWeek(2021, 1, 1)).toEqual({ year: 2020, week: 53 });
    });

    test("assigns late December days to the next week-year", () => {
      expect(isoWeek(2024, 12, 30)).toEqual({ year: 2025, week: 1 });
    });

    test("numbers mid-January weeks", () => {
      expect(isoWeek(2024, 1, 10)).toEqual({ year: 2024, week: 2 });
    });
  });

  describe("bucketKeys", () => {
    test("derives day, ISO week and month keys", () => {
      expect(bucketKeys({ year: 2024, month: 1, day: 10 })).toEqual({
        day: "2024-01-10",
        week: "2024-W02",
        month: "2024-01",
      });
    });

    test("uses the week-numbering year for the week key", () => {
      expect(bucketKeys({ year: 2021, month: 1, day: 1 })).toEqual({
        day: "2021-01-01",
        week: "2020-W53",
        month: "2021-01",
      });
    });
  });
});
