import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { BackupManager } from "../../core/backup";
import { errorMessage } from "../../core/errors";
import { isSnapshotCategory, SNAPSHOT_CATEGORIES, type SnapshotCategory } from "../../types";
import { formatBytes } from "../../utils/format";
import { INLINE_OPTIONS_HELP, loadCommandConfig } from "../config";
import { color, formatSummary, ui } from "../ui";

const CATEGORY_HINTS: Record<SnapshotCategory, string> = {
  manual: "One-time backup",
  events: "Before a bulk change",
  daily: "Same as the daily schedule",
  frequent: "Same as the hourly schedule",
};

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      type: { type: "string", short: "t" },
      description: { type: "string", short: "d" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
      // Inline config options
      ...INLINE_CONFIG_OPTIONS,
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const config = await loadCommandConfig(values);
    if (!config) return 1;

    ui.intro("shelfkeeper backup");

    let category = values.type;

    if (!category) {
      const selected = await ui.select({
        message: "Select a backup type",
        initialValue: "manual",
        options: [...SNAPSHOT_CATEGORIES]
          .reverse()
          .map((name) => ({ value: name, label: name, hint: CATEGORY_HINTS[name] })),
      });

      if (ui.isCancel(selected) || typeof selected !== "string") {
        ui.cancel("Backup cancelled");
        return 1;
      }

      category = selected;
    }

    if (!isSnapshotCategory(category)) {
      ui.error(`Unknown backup type: ${category}`);
      ui.info(`Available types: ${SNAPSHOT_CATEGORIES.join(", ")}`);
      return 1;
    }

    const manager = BackupManager.fromConfig(config);

    const s = ui.spinner();
    s.start("Creating snapshot...");
    const outcome = await manager.create(category, values.description);

    if (!outcome.success) {
      s.stop("Snapshot failed");
      ui.error(`${outcome.error.kind}: ${outcome.error.message}`);
      return 1;
    }

    s.stop("Snapshot created");

    const record = outcome.value;
    ui.note(
      formatSummary([
        { label: "File", value: record.file_path },
        { label: "Type", value: record.backup_type },
        { label: "Description", value: record.event_description },
        { label: "Database size", value: formatBytes(record.original_size ?? 0) },
        { label: "Snapshot size", value: formatBytes(record.size) },
        { label: "Ratio", value: record.compression_ratio },
      ]),
      "Backup Summary",
    );

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    ui.error(`Backup failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("shelfkeeper backup")} - Snapshot the library database

${color.dim("USAGE:")}
  shelfkeeper backup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>       Path to config file (default: ./shelfkeeper.config.yaml)
  -t, --type <type>         Backup type: ${SNAPSHOT_CATEGORIES.join(", ")}
                            If not provided, you'll be prompted to select one.
  -d, --description <text>  Short description added to the file name
  -v, --verbose             Verbose output
  -h, --help                Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("EXAMPLES:")}
  shelfkeeper backup                                # Interactive type selection
  shelfkeeper backup -t manual                      # Manual snapshot
  shelfkeeper backup -t events -d "before import"   # Snapshot before a bulk change
  shelfkeeper backup -t manual --database ./library.db
`);
}
