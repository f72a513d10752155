import { parseArgs } from "node:util";
import { ensureDestination, rotate, RunGuard, withRunGuard } from "../../core";
import { prepareRun, RUN_OPTIONS, terminate } from "../run";
import { color, formatSummary, ui } from "../ui";

export async function rotateCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: RUN_OPTIONS,
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const { ctx } = await prepareRun(values);

    ui.intro("keepsake rotate");

    const guard = new RunGuard(ctx.lockPath, { dryRun: ctx.dryRun });
    const report = await withRunGuard(guard, async () => {
      await ensureDestination(ctx);
      return rotate(ctx);
    });
    const anomalies = report.anomalies.map((anomaly) => anomaly.archiveName);

    ui.note(
      formatSummary([
        { label: "Kept", value: report.kept.length },
        { label: ctx.dryRun ? "Would delete" : "Deleted", value: report.deleted.length },
        { label: "Anomalies", value: anomalies.length > 0 ? anomalies.join(", ") : null },
        { label: "Failed", value: report.failed.length > 0 ? color.red(report.failed.join(", ")) : null },
      ]),
      "Rotation Summary",
    );

    if (report.failed.length > 0) {
      ui.error(`${report.failed.length} backup(s) could not be deleted`);
      return 1;
    }

    if (ctx.dryRun) {
      ui.warn("[DRY RUN] No changes were made.");
    }

    ui.outro("Rotation complete!");
    return 0;
  } catch (error) {
    return terminate(error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("keepsake rotate")} - Apply the retention policy to the backup destination

${color.dim("USAGE:")}
  keepsake rotate [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./keepsake.conf)
  -d, --dest <path>       Backup destination folder
      --daily-keep <n>    Distinct days to keep
      --weekly-keep <n>   Distinct ISO weeks to keep
      --monthly-keep <n>  Distinct months to keep
      --dry-run           Show what would be deleted without deleting it
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  keepsake rotate --dry-run                # Preview rotation
  keepsake rotate --daily-keep 3           # Keep only three days of dailies
`);
}
