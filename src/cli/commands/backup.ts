import { parseArgs } from "node:util";
import { runBackup } from "../../core";
import { formatBytes, formatDuration } from "../../utils/format";
import { prepareRun, RUN_OPTIONS, terminate } from "../run";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: RUN_OPTIONS,
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [source, ...extra] = positionals;
  if (!source || extra.length > 0) {
    ui.error(source ? `Unexpected arguments: ${extra.join(" ")}` : "Missing source folder");
    ui.info(`Run ${color.cyan("keepsake backup --help")} for usage`);
    return 1;
  }

  try {
    const { ctx } = await prepareRun(values);

    ui.intro("keepsake backup");

    const result = await runBackup(ctx, source);
    const { rotation } = result;
    const anomalies = rotation.anomalies.map((anomaly) => anomaly.archiveName);

    ui.note(
      formatSummary([
        { label: "Archive", value: result.archive.name },
        { label: "Location", value: result.archive.path },
        { label: "Size", value: result.archive.simulated ? "(simulated)" : formatBytes(result.archive.sizeBytes) },
        { label: "Checksum", value: result.digest?.digest ? `${result.digest.algorithm} ${result.digest.digest}` : null },
        { label: "Verified", value: result.verified ? "yes" : color.red("no") },
        { label: "Kept", value: rotation.kept.length },
        { label: "Deleted", value: rotation.deleted.length },
        { label: "Anomalies", value: anomalies.length > 0 ? anomalies.join(", ") : null },
        { label: "Notified", value: ctx.notifyTarget ? (result.notified ? "yes" : "no") : null },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Backup Summary",
    );

    if (!result.verified) {
      ui.error(`Backup verification failed: ${result.verifyError ?? "unknown error"}`);
      return 1;
    }

    if (ctx.dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
    }

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    return terminate(error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("keepsake backup")} - Archive a folder, seal it, verify it and rotate old archives

${color.dim("USAGE:")}
  keepsake [backup] <source> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./keepsake.conf)
      --dry-run             Show what would happen without changing anything
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("SETTINGS OVERRIDES:")}
  -d, --dest <path>         Backup destination folder
      --exclude <list>      Comma-separated exclude patterns
      --daily-keep <n>      Distinct days to keep
      --weekly-keep <n>     Distinct ISO weeks to keep
      --monthly-keep <n>    Distinct months to keep
      --checksum-algo <a>   sha256 or md5
      --min-free-mb <n>     Required free space in the destination
      --lock-path <path>    Lockfile location
      --notify <command>    Command run after a verified backup
      --prefix <prefix>     Archive name prefix (default: backup)
      --set <key=value>     Any settings key (can be repeated)

${color.dim("EXAMPLES:")}
  keepsake /srv/data                          # Back up with the default settings
  keepsake backup /srv/data -d /mnt/backups   # Back up to a specific destination
  keepsake /srv/data --dry-run                # Preview every step
`);
}
