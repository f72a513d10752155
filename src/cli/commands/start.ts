import { parseArgs } from "node:util";
import { Scheduler } from "../../core";
import { prepareRun, RUN_OPTIONS, terminate } from "../run";
import { color, ui } from "../ui";

export async function startCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...RUN_OPTIONS,
      cron: { type: "string" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [source, ...extra] = positionals;
  if (!values.cron || !source || extra.length > 0) {
    ui.error("Usage: keepsake start --cron <expression> <source>");
    return 1;
  }

  try {
    const { ctx } = await prepareRun(values);

    ui.intro("keepsake scheduler");

    const scheduler = new Scheduler(ctx, source, values.cron);
    const status = scheduler.getStatus();
    ui.step(`Backing up ${color.cyan(source)} on ${color.dim(status.cron)}, next: ${status.nextRun.toLocaleString()}`);

    scheduler.start();

    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    // Resolves once a shutdown signal arrives and the current run has finished
    await new Promise<void>((resolve) => {
      const shutdown = (): void => {
        process.removeListener("SIGINT", shutdown);
        process.removeListener("SIGTERM", shutdown);
        ui.cancel("Shutting down...");
        void scheduler.stop().then(resolve);
      };
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
    });

    return 0;
  } catch (error) {
    return terminate(error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("keepsake start")} - Run backups on a cron schedule

${color.dim("USAGE:")}
  keepsake start --cron <expression> <source> [OPTIONS]

${color.dim("OPTIONS:")}
      --cron <expr>       Five-field cron expression
  -c, --config <path>     Path to config file (default: ./keepsake.conf)
      --dry-run           Simulate every scheduled run
  -v, --verbose           Verbose output
  -h, --help              Show this help message

  Each due minute runs the full backup pipeline once. A run that fails,
  or finds the lock held by another process, is logged and skipped.

${color.dim("SCHEDULE FORMAT:")}
  minute hour day-of-month month day-of-week

    "0 * * * *"     - Every hour at minute 0
    "0 2 * * *"     - Every day at 2:00 AM
    "0 3 * * 0"     - Every Sunday at 3:00 AM
    "*/15 * * * *"  - Every 15 minutes

${color.dim("EXAMPLES:")}
  keepsake start --cron "0 2 * * *" /srv/data
  keepsake start --cron "*/30 * * * *" /srv/data -d /mnt/backups
`);
}
