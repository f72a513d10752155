import { describe, expect, test } from "vitest";
import { formatBytes, formatDuration } from "../../src/utils/format";

describe("format utilities", () => {
  describe("formatBytes", () => {
    test("formats zero bytes", () => {
      expect(formatBytes(0)).toBe("0 B");
    });

    test("formats bytes", () => {
      expect(formatBytes(500)).toBe("500.00 B");
      expect(formatBytes(1)).toBe("1.00 B");
    });

    test("formats kilobytes", () => {
      expect(formatBytes(1024)).toBe("1.00 KB");
      expect(formatBytes(1536)).toBe("1.50 KB");
    });

    test("formats megabytes and gigabytes", () => {
      expect(formatBytes(1024 * 1024 * 5.5)).toBe("5.50 MB");
      expect(formatBytes(1024 * 1024 * 1024 * 2.25)).toBe("2.25 GB");
    });

    test("caps at terabytes", () => {
      expect(formatBytes(1024 ** 4)).toBe("1.00 TB");
      expect(formatBytes(1024 ** 5)).toBe("1024.00 TB");
    });
  });

  describe("formatDuration", () => {
    test("formats milliseconds", () => {
      expect(formatDuration(0)).toBe("0ms");
      expect(formatDuration(999)).toBe("999ms");
    });

    test("formats seconds", () => {
      expect(formatDuration(1500)).toBe("1.5s");
      expect(formatDuration(59999)).toBe("60.0s");
    });

    test("formats minutes and seconds", () => {
      expect(formatDuration(90000)).toBe("1m 30s");
      expect(formatDuration(3599999)).toBe("59m 59s");
    });

    test("formats hours and minutes", () => {
      expect(formatDuration(3600000)).toBe("1h 0m");
      expect(formatDuration(3660000)).toBe("1h 1m");
    });
  });
});
