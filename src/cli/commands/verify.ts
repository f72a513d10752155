import { parseArgs } from "node:util";
import { listArchives, verifyDestination } from "../../core";
import type { VerifyOutcome } from "../../types";
import { logger } from "../../utils/logger";
import { prepareRun, RUN_OPTIONS, terminate } from "../run";
import { color, formatSummary, ui } from "../ui";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...RUN_OPTIONS,
      all: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  if (positionals.length === 0 && !values.all) {
    ui.error("Specify archive names or use --all to verify all backups");
    return 1;
  }

  try {
    const { ctx } = await prepareRun(values);

    ui.intro("keepsake verify");

    const outcomes: VerifyOutcome[] = [];
    let names: string[] | undefined;

    if (positionals.length > 0) {
      const entries = await listArchives(ctx.destinationDir, ctx.archivePrefix, ctx.checksumAlgorithm);
      const known = new Set(entries.map((entry) => entry.name));
      names = [];

      for (const name of positionals) {
        if (known.has(name)) {
          names.push(name);
        } else {
          logger.error(`Backup not found: ${name}`);
          outcomes.push({ archiveName: name, ok: false, code: "NotFound", message: `Backup not found: ${name}` });
        }
      }
    }

    if (names === undefined || names.length > 0) {
      outcomes.push(...(await verifyDestination(ctx, names)));
    }

    if (outcomes.length === 0) {
      ui.success("No backups to verify");
      ui.outro("Done");
      return 0;
    }

    const failures = outcomes.filter((outcome) => !outcome.ok);

    ui.note(
      formatSummary([
        { label: "Checked", value: outcomes.length },
        { label: "Passed", value: color.green(String(outcomes.length - failures.length)) },
        { label: "Failed", value: failures.length > 0 ? color.red(String(failures.length)) : "0" },
      ]),
      "Verification Summary",
    );

    for (const outcome of failures) {
      if (!outcome.ok) {
        ui.message(`${color.red("✗")} ${outcome.archiveName} ${color.dim(`(${outcome.code})`)}`);
      }
    }

    if (failures.length > 0) {
      ui.outro(`${failures.length} backup(s) failed verification`);
      return 1;
    }

    ui.outro("All backups verified");
    return 0;
  } catch (error) {
    return terminate(error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("keepsake verify")} - Check archives against their checksum files

${color.dim("USAGE:")}
  keepsake verify <archive>... [OPTIONS]
  keepsake verify --all [OPTIONS]

${color.dim("OPTIONS:")}
      --all               Verify every backup in the destination
  -c, --config <path>     Path to config file (default: ./keepsake.conf)
  -d, --dest <path>       Backup destination folder
  -v, --verbose           Verbose output
  -h, --help              Show this help message

  Each archive must have a checksum file, match it, and extract cleanly.
  The command exits non-zero when any archive fails.

${color.dim("EXAMPLES:")}
  keepsake verify --all
  keepsake verify backup-2024-01-10-020000.tar.gz
`);
}
