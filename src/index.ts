#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { coverCommand } from "./cli/commands/cover";
import { listCommand } from "./cli/commands/list";
import { restoreCommand } from "./cli/commands/restore";
import { serveCommand } from "./cli/commands/serve";
import { startCommand } from "./cli/commands/start";
import { verifyCommand } from "./cli/commands/verify";
import { LOGO, VERSION } from "./cli/ui";

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("ShelfKeeper")} ${color.dim(`v${VERSION}`)} - Library database backups and covers`);

  p.note(
    `${color.cyan("serve")}       Run the HTTP server (and the scheduler)
${color.cyan("start")}       Run only the scheduler daemon
${color.cyan("backup")}      Create a snapshot
${color.cyan("list")}        List existing snapshots
${color.cyan("restore")}     Restore the database from a snapshot
${color.cyan("verify")}      Verify snapshot integrity
${color.cyan("cover")}       Get a book's cover image`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `shelfkeeper serve                      ${color.dim("# HTTP server with scheduled snapshots")}
shelfkeeper backup -t manual           ${color.dim("# Create a manual snapshot")}
shelfkeeper backup                     ${color.dim("# Interactive type selection")}
shelfkeeper list -t daily              ${color.dim("# List daily snapshots")}
shelfkeeper restore                    ${color.dim("# Pick a snapshot to restore")}
shelfkeeper verify --all               ${color.dim("# Verify every snapshot")}
shelfkeeper cover 1042 -o cover.jpg    ${color.dim("# Save a book's cover")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("shelfkeeper <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.outro(`${color.cyan("ShelfKeeper")} ${color.dim(`v${VERSION}`)}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "serve":
      return serveCommand(commandArgs);

    case "start":
      return startCommand(commandArgs);

    case "backup":
      return backupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "cover":
      return coverCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("shelfkeeper --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
