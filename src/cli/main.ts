/**
 * Command dispatch
 */

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./commands/backup";
import { listCommand } from "./commands/list";
import { restoreCommand } from "./commands/restore";
import { rotateCommand } from "./commands/rotate";
import { startCommand } from "./commands/start";
import { verifyCommand } from "./commands/verify";
import { NAME, VERSION } from "./ui";

export function printHelp(): void {
  p.intro(`${color.cyan(NAME)} ${color.dim(`v${VERSION}`)} - Rotating folder backups`);

  p.note(
    `${color.cyan("backup")}      Archive a folder, verify it and rotate old archives (default)
${color.cyan("list")}        List existing backups
${color.cyan("restore")}     Extract a backup into a folder
${color.cyan("verify")}      Verify backup integrity
${color.cyan("rotate")}      Apply the retention policy
${color.cyan("start")}       Run backups on a cron schedule`,
    "Commands",
  );

  p.note(
    `-c, --config <path>   Config file (default: ./keepsake.conf)
    --dry-run         Show what would happen without changing anything
    --list            Same as the list command
    --restore <file>  Same as the restore command
-h, --help            Show this help message
    --version         Show version`,
    "Options",
  );

  p.note(
    `keepsake /srv/data                     ${color.dim("# Back up a folder")}
keepsake /srv/data --dry-run           ${color.dim("# Preview a backup")}
keepsake list                          ${color.dim("# List all backups")}
keepsake restore <archive> --to /tmp   ${color.dim("# Restore a backup")}
keepsake verify --all                  ${color.dim("# Verify all backups")}
keepsake start --cron "0 2 * * *" /srv ${color.dim("# Nightly backups")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("keepsake <command> --help")} for command details`);
}

export async function main(args: string[]): Promise<number> {
  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const [command = "", ...commandArgs] = args;

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "list":
    case "--list":
      return listCommand(commandArgs);

    case "restore":
    case "--restore":
      return restoreCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "rotate":
      return rotateCommand(commandArgs);

    case "start":
      return startCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "--version":
    case "version":
      console.log(`${NAME} v${VERSION}`);
      return 0;
  }

  // --list and --restore may also follow global flags
  const aliasIndex = args.findIndex((arg) => arg === "--list" || arg === "--restore");
  if (aliasIndex !== -1) {
    const rest = [...args.slice(0, aliasIndex), ...args.slice(aliasIndex + 1)];
    return args[aliasIndex] === "--list" ? listCommand(rest) : restoreCommand(rest);
  }

  // Anything else is the default backup mode: a source folder, possibly after global flags
  if (!command.startsWith("-") || args.some((arg) => !arg.startsWith("-"))) {
    return backupCommand(args);
  }

  console.error(`${color.red("Error:")} Unknown command: ${command}`);
  console.error(`Run ${color.cyan("keepsake --help")} for usage information.`);
  return 1;
}
