import { parseArgs } from "node:util";
import { listArchives } from "../../core";
import type { CatalogEntry } from "../../types";
import { formatBytes } from "../../utils/format";
import { archiveDate } from "../../utils/naming";
import { prepareRun, RUN_OPTIONS, terminate } from "../run";
import { color, formatCsvRow, formatTableRow, formatTableSeparator, TABLE_WIDTHS, ui } from "../ui";

const LIST_FORMATS = ["table", "json", "csv"] as const;
type ListFormat = (typeof LIST_FORMATS)[number];

function isListFormat(value: string): value is ListFormat {
  return LIST_FORMATS.some((format) => format === value);
}

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...RUN_OPTIONS,
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const format = values.format;
  if (!isListFormat(format)) {
    ui.error(`Unknown format: ${format} (expected ${LIST_FORMATS.join(", ")})`);
    return 1;
  }

  const limit = values.limit ? Number.parseInt(values.limit, 10) : undefined;
  if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
    ui.error(`--limit expects a positive integer, got "${values.limit}"`);
    return 1;
  }

  try {
    const { ctx } = await prepareRun(values);

    let entries = await listArchives(ctx.destinationDir, ctx.archivePrefix, ctx.checksumAlgorithm);
    if (limit) {
      entries = entries.slice(0, limit);
    }

    // Output based on format - no intro for scripting formats
    switch (format) {
      case "json":
        console.log(JSON.stringify(entries.map(toRecord), null, 2));
        return 0;
      case "csv":
        printCsv(entries);
        return 0;
      case "table":
        ui.intro("keepsake list");

        if (entries.length === 0) {
          ui.info(`No backups found in ${ctx.destinationDir}`);
          ui.outro("Done");
          return 0;
        }

        printTable(entries);
        ui.outro(`${entries.length} backup(s) total`);
        return 0;
    }
  } catch (error) {
    return terminate(error, values.verbose);
  }
}

export interface ListedArchive {
  name: string;
  path: string;
  /** ISO-8601 instant from the name's timestamp, null when it has none */
  createdAt: string | null;
  sizeBytes: number;
  sealed: boolean;
}

export function toRecord(entry: CatalogEntry): ListedArchive {
  return {
    name: entry.name,
    path: entry.path,
    createdAt: entry.parsed ? archiveDate(entry.parsed).toISOString() : null,
    sizeBytes: entry.sizeBytes,
    sealed: entry.sealed,
  };
}

function createdLabel(entry: CatalogEntry): string {
  if (!entry.parsed) return color.yellow("unparseable");
  const { year, month, day, hour, minute, second } = entry.parsed;
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

function printTable(entries: CatalogEntry[]): void {
  const widths = [TABLE_WIDTHS.archiveName, TABLE_WIDTHS.created, TABLE_WIDTHS.size, TABLE_WIDTHS.sealed];

  ui.step("Backups:");
  console.log(formatTableRow(["Archive", "Created", "Size", "Sealed"], widths));
  console.log(formatTableSeparator(widths));

  for (const entry of entries) {
    console.log(
      formatTableRow(
        [
          entry.name,
          createdLabel(entry),
          formatBytes(entry.sizeBytes),
          entry.sealed ? color.green("yes") : color.red("no"),
        ],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

function printCsv(entries: CatalogEntry[]): void {
  console.log("name,created_at,size_bytes,sealed,path");

  for (const entry of entries) {
    const record = toRecord(entry);
    console.log(formatCsvRow([record.name, record.createdAt ?? "", record.sizeBytes, record.sealed, record.path]));
  }
}

function printHelp(): void {
  console.log(`
${color.bold("keepsake list")} - List archives in the backup destination, newest first

${color.dim("USAGE:")}
  keepsake list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./keepsake.conf)
  -d, --dest <path>       Backup destination folder
  -n, --limit <number>    Limit number of results
      --format <format>   Output format: table, json, csv (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  keepsake list                            # List all backups
  keepsake list -n 10                      # List the 10 newest backups
  keepsake list --format json              # Output as JSON (for scripting)
  keepsake list --format csv               # Output as CSV (for scripting)
`);
}
