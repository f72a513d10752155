/**
 * Archive naming and date-key utilities.
 *
 * The timestamp embedded in an archive's file name is the source of truth for
 * its creation instant. The builder and the rotator both go through this module
 * so a name written by one is always read back identically by the other.
 */

export const DEFAULT_ARCHIVE_PREFIX = "backup";
export const ARCHIVE_EXTENSION = ".tar.gz";

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})-(\d{2})(\d{2})(\d{2})$/;

export interface ParsedArchiveName {
  prefix: string;
  /** Raw `YYYY-MM-DD-HHMMSS` segment */
  timestamp: string;
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export interface BucketKeys {
  /** Calendar date, `YYYY-MM-DD` */
  day: string;
  /** ISO-8601 week, `YYYY-Www` (week-numbering year) */
  week: string;
  /** Calendar month, `YYYY-MM` */
  month: string;
}

function pad(n: number, width: number = 2): string {
  return String(n).padStart(width, "0");
}

export function formatArchiveTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function generateArchiveName(
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
  date: Date = new Date(),
  ext: string = ARCHIVE_EXTENSION,
): string {
  return `${prefix}-${formatArchiveTimestamp(date)}${ext}`;
}

export function digestRecordName(archiveName: string, algorithm: string): string {
  return `${archiveName}.${algorithm}`;
}

/**
 * Whether a file name belongs to the archive set (`<prefix>-*<ext>`),
 * regardless of whether its timestamp can be parsed.
 */
export function isArchiveCandidate(
  name: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
  ext: string = ARCHIVE_EXTENSION,
): boolean {
  return name.startsWith(`${prefix}-`) && name.endsWith(ext) && name.length > prefix.length + 1 + ext.length;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function parseArchiveTimestamp(timestamp: string): Omit<ParsedArchiveName, "prefix"> | null {
  const match = TIMESTAMP_PATTERN.exec(timestamp);
  if (!match) return null;

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    second === undefined
  ) {
    return null;
  }

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  return { timestamp, year, month, day, hour, minute, second };
}

export function parseArchiveName(
  name: string,
  prefix: string = DEFAULT_ARCHIVE_PREFIX,
  ext: string = ARCHIVE_EXTENSION,
): ParsedArchiveName | null {
  if (!isArchiveCandidate(name, prefix, ext)) return null;

  const timestamp = name.slice(prefix.length + 1, name.length - ext.length);
  const parsed = parseArchiveTimestamp(timestamp);
  return parsed ? { prefix, ...parsed } : null;
}

/**
 * Local-time instant represented by a parsed name.
 */
export function archiveDate(parsed: ParsedArchiveName): Date {
  return new Date(parsed.year, parsed.month - 1, parsed.day, parsed.hour, parsed.minute, parsed.second);
}

export function isoWeek(year: number, month: number, day: number): { year: number; week: number } {
  const date = new Date(Date.UTC(year, month - 1, day));
  // Thursday of the same week decides the week-numbering year
  const weekday = date.getUTCDay() || 7;
  date.setUTCDate(date.getUTCDate() + 4 - weekday);

  const weekYear = date.getUTCFullYear();
  const yearStart = Date.UTC(weekYear, 0, 1);
  const week = Math.ceil(((date.getTime() - yearStart) / 86_400_000 + 1) / 7);

  return { year: weekYear, week };
}

export function bucketKeys(parsed: Pick<ParsedArchiveName, "year" | "month" | "day">): BucketKeys {
  const { year, month, day } = parsed;
  const iso = isoWeek(year, month, day);

  return {
    day: `${pad(year, 4)}-${pad(month)}-${pad(day)}`,
    week: `${pad(iso.year, 4)}-W${pad(iso.week)}`,
    month: `${pad(year, 4)}-${pad(month)}`,
  };
}
