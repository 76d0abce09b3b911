import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { BackupManager } from "../../core/backup";
import { errorMessage } from "../../core/errors";
import { closeDatabase, initDatabase } from "../../db";
import { INLINE_OPTIONS_HELP, loadCommandConfig } from "../config";
import { color, formatSummary, snapshotOption, ui } from "../ui";

const PICKER_LIMIT = 20;

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      yes: { type: "boolean", short: "y", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    if (!config) return 1;

    const manager = BackupManager.fromConfig(config);

    ui.intro("shelfkeeper restore");

    let snapshotPath = positionals[0];

    if (!snapshotPath) {
      const backups = await manager.list();
      if (backups.length === 0) {
        ui.info("No backups found");
        ui.outro("Nothing to restore");
        return 1;
      }

      const selected = await ui.select({
        message: "Select a backup to restore",
        initialValue: backups[0]?.file_path,
        options: backups.slice(0, PICKER_LIMIT).map(snapshotOption),
      });

      if (ui.isCancel(selected) || typeof selected !== "string") {
        ui.cancel("Restore cancelled");
        return 1;
      }

      snapshotPath = selected;
    }

    if (!values.yes) {
      const confirmed = await ui.confirm({
        message: `Replace ${config.database.path} with ${snapshotPath}?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Restore cancelled");
        ui.info("Run with --yes to skip confirmation");
        return 1;
      }
    }

    const s = ui.spinner();
    s.start("Restoring...");
    const outcome = await manager.restore(snapshotPath);

    if (!outcome.success) {
      s.stop("Restore failed");
      ui.error(`${outcome.error.kind}: ${outcome.error.message}`);
      return 1;
    }

    // A restored file may predate the current schema
    await initDatabase(config.database.path);
    closeDatabase();

    s.stop("Database restored");

    ui.note(
      formatSummary([
        { label: "Restored from", value: outcome.value.restoredFrom },
        { label: "Safety backup", value: outcome.value.safetySnapshot ?? color.yellow("not taken") },
      ]),
      "Restore Summary",
    );

    ui.outro(outcome.value.message);
    return 0;
  } catch (error) {
    ui.error(`Restore failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("shelfkeeper restore")} - Replace the library database with a backup

${color.dim("USAGE:")}
  shelfkeeper restore [BACKUP_FILE] [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./shelfkeeper.config.yaml)
  -y, --yes               Skip the confirmation prompt
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("DESCRIPTION:")}
  BACKUP_FILE is a snapshot path, absolute or relative to the backup
  directory (for example manual/library_backup_20261018_140309.db.gz).
  Without it you pick from the newest backups.

  A safety backup of the current database is taken first (type "events").
  Stop a running server before restoring from the command line.

${color.dim("EXAMPLES:")}
  shelfkeeper restore                                          # Pick interactively
  shelfkeeper restore daily/library_backup_20261017_020000.db.gz --yes
`);
}
