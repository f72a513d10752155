import { mkdir, readFile, rm } from "node:fs/promises";
import * as path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, test, vi } from "vitest";
import {
  debug,
  error,
  failed,
  formatLine,
  formatTimestamp,
  getLogFile,
  getLogLevel,
  info,
  logger,
  setLogFile,
  setLogLevel,
  success,
  warn,
} from "../../src/utils/logger";
import { makeTempDir, silenceConsole, spiedLines } from "../helpers";

const LINE_PATTERN = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] ([A-Z]+): (.*)$/;

describe("logger", () => {
  let originalLevel: ReturnType<typeof getLogLevel>;
  let consoleSpies: ReturnType<typeof silenceConsole>;
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await makeTempDir("logger");
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    originalLevel = getLogLevel();
    consoleSpies = silenceConsole();
  });

  afterEach(() => {
    setLogLevel(originalLevel);
    setLogFile(null);
    vi.restoreAllMocks();
  });

  describe("setLogLevel / getLogLevel", () => {
    test("sets and gets log level", () => {
      setLogLevel("debug");
      expect(getLogLevel()).toBe("debug");

      setLogLevel("error");
      expect(getLogLevel()).toBe("error");
    });
  });

  describe("log level filtering", () => {
    test("debug logs when level is debug", () => {
      setLogLevel("debug");
      debug("test message");
      expect(consoleSpies.log).toHaveBeenCalledTimes(1);
    });

    test("debug does not log when level is info", () => {
      setLogLevel("info");
      debug("test message");
      expect(consoleSpies.log).not.toHaveBeenCalled();
    });

    test("info and success are suppressed at warn", () => {
      setLogLevel("warn");
      info("test message");
      success("test message");
      expect(consoleSpies.log).not.toHaveBeenCalled();
    });

    test("failed and error still log at error level", () => {
      setLogLevel("error");
      warn("hidden");
      failed("shown");
      error("shown");
      expect(consoleSpies.warn).not.toHaveBeenCalled();
      expect(consoleSpies.error).toHaveBeenCalledTimes(2);
    });
  });

  describe("console routing", () => {
    test("routes each level to its console method", () => {
      info("to stdout");
      success("to stdout too");
      warn("to warn");
      failed("to stderr");
      error("to stderr too");

      expect(spiedLines(consoleSpies.log).map((line) => line.replace(LINE_PATTERN, "$1: $2"))).toEqual([
        "INFO: to stdout",
        "SUCCESS: to stdout too",
      ]);
      expect(spiedLines(consoleSpies.warn).map((line) => line.replace(LINE_PATTERN, "$1: $2"))).toEqual([
        "WARN: to warn",
      ]);
      expect(spiedLines(consoleSpies.error).map((line) => line.replace(LINE_PATTERN, "$1: $2"))).toEqual([
        "FAILED: to stderr",
        "ERROR: to stderr too",
      ]);
    });
  });

  describe("formatLine", () => {
    test("prefixes a timestamp and the upper-case level", () => {
      const line = formatLine("warn", "disk almost full");
      expect(line).toMatch(LINE_PATTERN);
      expect(line.endsWith("] WARN: disk almost full")).toBe(true);
    });

    test("appends object data as JSON", () => {
      expect(formatLine("info", "settings", { daily_keep: 7 }).endsWith('INFO: settings {"daily_keep":7}')).toBe(true);
    });

    test("appends primitive data as text", () => {
      expect(formatLine("debug", "count", 3).endsWith("DEBUG: count 3")).toBe(true);
    });
  });

  describe("formatTimestamp", () => {
    test("formats local time with zero padding", () => {
      expect(formatTimestamp(new Date(2024, 0, 5, 3, 4, 5))).toBe("2024-01-05 03:04:05");
    });
  });

  describe("file sink", () => {
    test("appends uncoloured lines to the log file", async () => {
      const logFile = path.join(tempDir, "append.log");
      setLogFile(logFile);

      info("first");
      logger.failed("second");

      const lines = (await readFile(logFile, "utf8")).trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(LINE_PATTERN);
      expect(lines[0]?.replace(LINE_PATTERN, "$1: $2")).toBe("INFO: first");
      expect(lines[1]?.replace(LINE_PATTERN, "$1: $2")).toBe("FAILED: second");
    });

    test("skips suppressed levels", async () => {
      const logFile = path.join(tempDir, "filtered.log");
      setLogFile(logFile);

      debug("hidden");
      info("visible");

      const content = await readFile(logFile, "utf8");
      expect(content.trimEnd().split("\n")).toHaveLength(1);
    });

    test("disables itself when the file cannot be written", async () => {
      const unwritable = path.join(tempDir, "a-directory");
      await mkdir(unwritable);
      setLogFile(unwritable);

      info("first");
      info("second");

      expect(getLogFile()).toBeNull();
      expect(consoleSpies.warn).toHaveBeenCalledTimes(1);
      expect(spiedLines(consoleSpies.warn)[0]).toContain(`Log file ${unwritable} is not writable`);
    });
  });
});
