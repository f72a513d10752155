import { appendFileSync } from "node:fs";
import color from "picocolors";

export type LogLevel = "debug" | "info" | "success" | "warn" | "failed" | "error";

let currentLevel: LogLevel = "info";
let logFilePath: string | null = null;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  failed: 3,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: color.gray,
  info: color.cyan,
  success: color.green,
  warn: color.yellow,
  failed: color.magenta,
  error: color.red,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Mirror every emitted line, uncoloured, into an append-only file.
 * Pass null to detach the file sink.
 */
export function setLogFile(filePath: string | null): void {
  logFilePath = filePath;
}

export function getLogFile(): string | null {
  return logFilePath;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

export function formatLine(level: LogLevel, message: string, data?: unknown): string {
  let line = `[${formatTimestamp()}] ${level.toUpperCase()}: ${message}`;

  if (data !== undefined) {
    if (typeof data === "object") {
      line += ` ${JSON.stringify(data)}`;
    } else {
      line += ` ${String(data)}`;
    }
  }

  return line;
}

function writeToFile(line: string): void {
  if (!logFilePath) return;

  try {
    appendFileSync(logFilePath, `${line}\n`);
  } catch (err) {
    const failedPath = logFilePath;
    logFilePath = null;
    console.warn(
      color.yellow(`Log file ${failedPath} is not writable, file logging disabled: ${err instanceof Error ? err.message : String(err)}`),
    );
  }
}

function emit(level: LogLevel, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;

  const line = formatLine(level, message, data);
  const colored = LEVEL_COLORS[level](line);

  switch (level) {
    case "warn":
      console.warn(colored);
      break;
    case "failed":
    case "error":
      console.error(colored);
      break;
    default:
      console.log(colored);
  }

  writeToFile(line);
}

export function debug(message: string, data?: unknown): void {
  emit("debug", message, data);
}

export function info(message: string, data?: unknown): void {
  emit("info", message, data);
}

export function success(message: string, data?: unknown): void {
  emit("success", message, data);
}

export function warn(message: string, data?: unknown): void {
  emit("warn", message, data);
}

export function failed(message: string, data?: unknown): void {
  emit("failed", message, data);
}

export function error(message: string, data?: unknown): void {
  emit("error", message, data);
}

export const logger = {
  debug,
  info,
  success,
  warn,
  failed,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
  setFile: setLogFile,
};
