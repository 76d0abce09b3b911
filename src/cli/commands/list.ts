import { parseArgs } from "node:util";
import { BackupManager } from "../../core/backup";
import { errorMessage } from "../../core/errors";
import { isSnapshotCategory, SNAPSHOT_CATEGORIES, type SnapshotRecord } from "../../types";
import { formatBytes } from "../../utils/format";
import { loadCommandConfig } from "../config";
import {
  color,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  TABLE_WIDTHS,
  ui,
} from "../ui";

const CSV_COLUMNS = [
  "file_path",
  "backup_type",
  "timestamp",
  "size",
  "original_size",
  "compression_ratio",
  "event_description",
] as const;

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      database: { type: "string" },
      "backup-dir": { type: "string" },
      type: { type: "string", short: "t" },
      limit: { type: "string", short: "n" },
      format: { type: "string", default: "table" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
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

    let backups = await BackupManager.fromConfig(config).list();

    if (values.type) {
      if (!isSnapshotCategory(values.type)) {
        ui.error(`Unknown backup type: ${values.type}`);
        return 1;
      }
      backups = backups.filter((b) => b.backup_type === values.type);
    }

    const limit = values.limit ? Number.parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      backups = backups.slice(0, limit);
    }

    // No intro for scripting formats
    switch (values.format) {
      case "json":
        console.log(JSON.stringify(backups, null, 2));
        return 0;
      case "csv":
        printCsv(backups);
        return 0;
      default:
        ui.intro("shelfkeeper list");

        if (backups.length === 0) {
          ui.info("No backups found");
          ui.outro("Done");
          return 0;
        }

        printTable(backups);

        ui.outro(`${backups.length} backup(s) total`);
        return 0;
    }
  } catch (error) {
    ui.error(`List failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printTable(backups: SnapshotRecord[]): void {
  const widths = [
    TABLE_WIDTHS.fileName,
    TABLE_WIDTHS.category,
    TABLE_WIDTHS.created,
    TABLE_WIDTHS.size,
    TABLE_WIDTHS.ratio,
  ];

  ui.step("Backups:");
  console.log(formatTableRow(["File", "Type", "Created", "Size", "Ratio"], widths));
  console.log(formatTableSeparator(widths));

  for (const backup of backups) {
    const type =
      backup.backup_type === "manual" ? backup.backup_type : color.cyan(backup.backup_type);
    console.log(
      formatTableRow(
        [
          backup.file_name,
          type,
          formatTimestamp(backup.timestamp),
          formatBytes(backup.size),
          backup.compression_ratio !== undefined ? String(backup.compression_ratio) : "-",
        ],
        widths,
      ),
    );
  }

  console.log(formatTableSeparator(widths));
}

function csvField(value: string | number | null | undefined): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  return /[",\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(backups: SnapshotRecord[]): string[] {
  return [
    CSV_COLUMNS.join(","),
    ...backups.map((backup) => CSV_COLUMNS.map((column) => csvField(backup[column])).join(",")),
  ];
}

function printCsv(backups: SnapshotRecord[]): void {
  for (const line of toCsv(backups)) {
    console.log(line);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("shelfkeeper list")} - List existing backups

${color.dim("USAGE:")}
  shelfkeeper list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./shelfkeeper.config.yaml)
      --database <path>   Library database file (without a config file)
      --backup-dir <path> Snapshot root directory
  -t, --type <type>       Filter by type: ${SNAPSHOT_CATEGORIES.join(", ")}
  -n, --limit <number>    Limit number of results
      --format <format>   Output format: table, json, csv (default: table)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  shelfkeeper list                         # List all backups
  shelfkeeper list -t daily                # Daily backups only
  shelfkeeper list -n 10                   # Newest 10 backups
  shelfkeeper list --format json           # Output as JSON (for scripting)
  shelfkeeper list --format csv            # Output as CSV (for scripting)
`);
}
