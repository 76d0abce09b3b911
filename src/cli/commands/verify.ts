import { parseArgs } from "node:util";
import { BackupManager } from "../../core/backup";
import { errorMessage } from "../../core/errors";
import type { VerifyReport } from "../../types";
import { formatBytes } from "../../utils/format";
import { loadCommandConfig } from "../config";
import { color, formatSummary, ui } from "../ui";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      database: { type: "string" },
      "backup-dir": { type: "string" },
      all: { type: "boolean", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
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

    let targets: string[];
    if (positionals.length > 0) {
      targets = positionals;
    } else if (values.all) {
      targets = (await manager.list()).map((b) => b.file_path);
    } else {
      ui.error("Specify backup files or use --all to verify all backups");
      return 1;
    }

    ui.intro("shelfkeeper verify");

    if (targets.length === 0) {
      ui.success("No backups to verify");
      ui.outro("Done");
      return 0;
    }

    const s = ui.spinner();
    s.start(`Verifying ${targets.length} backup(s)...`);

    const reports: VerifyReport[] = [];
    const failures: { target: string; message: string }[] = [];

    for (const target of targets) {
      const outcome = await manager.verify(target);
      if (outcome.success) {
        reports.push(outcome.value);
      } else {
        failures.push({ target, message: outcome.error.message });
      }
    }

    s.stop("Verification complete");

    for (const report of reports) {
      if (report.issues.length === 0) {
        ui.success(`${report.filePath} ${color.dim(formatBytes(report.decompressedSize))}`);
      } else {
        ui.warn(report.filePath);
        for (const issue of report.issues) {
          ui.message(`  ${color.dim("•")} ${issue}`);
        }
      }
    }
    for (const failure of failures) {
      ui.error(`${failure.target}: ${failure.message}`);
    }

    const withIssues = reports.filter((r) => r.issues.length > 0).length;

    ui.note(
      formatSummary([
        { label: "Verified", value: targets.length },
        { label: "Healthy", value: reports.length - withIssues },
        { label: "With issues", value: withIssues },
        { label: "Unreadable", value: failures.length },
      ]),
      "Verification Summary",
    );

    if (withIssues > 0 || failures.length > 0) {
      ui.outro("Verification found issues");
      return 1;
    }

    ui.outro("All backups verified!");
    return 0;
  } catch (error) {
    ui.error(`Verify failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("shelfkeeper verify")} - Verify backup integrity

${color.dim("USAGE:")}
  shelfkeeper verify [BACKUP_FILE...] [OPTIONS]
  shelfkeeper verify --all [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./shelfkeeper.config.yaml)
      --database <path>   Library database file (without a config file)
      --backup-dir <path> Snapshot root directory
      --all               Verify every backup
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("DESCRIPTION:")}
  Decompresses each backup and compares its size and SHA256 checksum with
  the metadata file written next to it.

${color.dim("EXAMPLES:")}
  shelfkeeper verify --all
  shelfkeeper verify manual/library_backup_20261018_140309_user_initiated.db.gz
`);
}
