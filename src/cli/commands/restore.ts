import { parseArgs } from "node:util";
import { listArchives, resolveArchivePath, runRestore } from "../../core";
import type { RunContext } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { prepareRun, RUN_OPTIONS, terminate } from "../run";
import { color, formatSummary, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...RUN_OPTIONS,
      to: { type: "string", short: "t" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (positionals.length > 1) {
    ui.error(`Unexpected arguments: ${positionals.slice(1).join(" ")}`);
    return 1;
  }

  const targetDir = values.to;
  if (!targetDir) {
    ui.error("Missing restore target, use --to <dir>");
    ui.info(`Run ${color.cyan("keepsake restore --help")} for usage`);
    return 1;
  }

  try {
    const { ctx } = await prepareRun(values);

    ui.intro("keepsake restore");

    let archive = positionals[0];
    if (!archive) {
      if (!ui.isInteractive()) {
        ui.error("Missing archive to restore");
        return 1;
      }

      const picked = await pickArchive(ctx);
      if (picked === null) {
        ui.cancel("Restore cancelled");
        return 1;
      }
      archive = picked;
    }

    const result = await runRestore(ctx, resolveArchivePath(archive, ctx), targetDir);

    ui.note(
      formatSummary([
        { label: "Archive", value: result.archivePath },
        { label: "Target", value: result.targetDir },
        { label: "Duration", value: formatDuration(result.durationMs) },
      ]),
      "Restore Summary",
    );

    if (result.simulated) {
      ui.warn("[DRY RUN] No changes were made.");
    }

    ui.outro("Restore complete!");
    return 0;
  } catch (error) {
    return terminate(error, values.verbose);
  }
}

/**
 * Let the user choose an archive from the destination. Returns null on cancel
 * or when there is nothing to choose from.
 */
async function pickArchive(ctx: RunContext): Promise<string | null> {
  const entries = await listArchives(ctx.destinationDir, ctx.archivePrefix, ctx.checksumAlgorithm);
  if (entries.length === 0) {
    ui.warn(`No backups found in ${ctx.destinationDir}`);
    return null;
  }

  const selected = await ui.select({
    message: "Select a backup to restore",
    options: entries.map((entry) => ({
      value: entry.path,
      label: entry.name,
      hint: entry.sealed ? formatBytes(entry.sizeBytes) : `${formatBytes(entry.sizeBytes)}, no checksum`,
    })),
  });

  if (ui.isCancel(selected)) {
    return null;
  }
  return selected;
}

function printHelp(): void {
  console.log(`
${color.bold("keepsake restore")} - Extract an archive into a folder

${color.dim("USAGE:")}
  keepsake restore [archive] --to <dir> [OPTIONS]

${color.dim("OPTIONS:")}
  -t, --to <dir>          Folder to extract into (created when missing)
  -c, --config <path>     Path to config file (default: ./keepsake.conf)
  -d, --dest <path>       Backup destination folder
      --dry-run           Show what would be restored without doing it
  -v, --verbose           Verbose output
  -h, --help              Show this help message

  The archive is a path, or a file name inside the backup destination.
  Without one, you are asked to pick from the destination's backups.
  Existing files in the target are overwritten by archive members.

${color.dim("EXAMPLES:")}
  keepsake restore backup-2024-01-10-020000.tar.gz --to /srv/restore
  keepsake restore --to /srv/restore                # Interactive selection
  keepsake --restore ./old.tar.gz --to /tmp/check
`);
}
