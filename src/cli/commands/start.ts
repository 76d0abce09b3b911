import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { BackupManager } from "../../core/backup";
import { errorMessage } from "../../core/errors";
import { Scheduler, type ScheduleStatus } from "../../core/scheduler";
import { INLINE_OPTIONS_HELP, loadCommandConfig } from "../config";
import { color, ui } from "../ui";

/**
 * Resolves with the signal that asked the process to stop
 */
export function waitForShutdown(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const handler = (signal: NodeJS.Signals) => {
      process.off("SIGINT", handler);
      process.off("SIGTERM", handler);
      resolve(signal);
    };
    process.on("SIGINT", handler);
    process.on("SIGTERM", handler);
  });
}

export function printSchedules(status: ScheduleStatus[]): void {
  ui.step("Configured schedules:");
  for (const s of status) {
    ui.message(
      `  ${color.cyan(s.category.padEnd(10))} ${color.dim(s.cron.padEnd(15))} ${color.dim("next:")} ${s.nextRun.toLocaleString()}`,
    );
  }
}

export async function startCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
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

    ui.intro("shelfkeeper scheduler");

    const scheduler = new Scheduler(config, BackupManager.fromConfig(config));

    if (scheduler.size === 0) {
      ui.error("No schedules configured");
      ui.info("Add a schedules section to your config file to use the scheduler");
      return 1;
    }

    printSchedules(scheduler.getStatus());

    const shutdown = waitForShutdown();
    scheduler.start();

    ui.success("Scheduler is running");
    ui.info("Press Ctrl+C to stop");

    const signal = await shutdown;
    ui.cancel(`Received ${signal}, shutting down...`);
    await scheduler.stop();

    return 0;
  } catch (error) {
    ui.error(`Failed to start: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("shelfkeeper start")} - Start the scheduler daemon

${color.dim("USAGE:")}
  shelfkeeper start [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./shelfkeeper.config.yaml)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("DESCRIPTION:")}
  Runs the scheduled snapshots without the HTTP server. Each snapshot
  prunes its category down to the configured retention afterwards.

${color.dim("SCHEDULE FORMAT:")}
  Schedules use standard cron format: minute hour day-of-month month day-of-week

  Examples:
    "0 2 * * *"     - daily at 2:00 AM
    "0 * * * *"     - every hour at minute 0

${color.dim("EXAMPLES:")}
  shelfkeeper start
  shelfkeeper start -c /etc/shelfkeeper.yaml -v
`);
}
