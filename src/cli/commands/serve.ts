import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { errorMessage } from "../../core/errors";
import { Scheduler } from "../../core/scheduler";
import { closeDatabase, initDatabase } from "../../db";
import { createContainer, startServer } from "../../server";
import { createLogger } from "../../utils/logger";
import { INLINE_OPTIONS_HELP, loadCommandConfig } from "../config";
import { banner, color, ui } from "../ui";
import { printSchedules, waitForShutdown } from "./start";

const logger = createLogger("serve");

export async function serveCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      "no-scheduler": { type: "boolean", default: false },
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

    banner("serve");

    await initDatabase(config.database.path);

    const container = createContainer(config);
    const scheduler = values["no-scheduler"] ? null : new Scheduler(config, container.backups);

    const shutdown = waitForShutdown();
    const server = await startServer(container);

    if (scheduler && scheduler.size > 0) {
      printSchedules(scheduler.getStatus());
      scheduler.start();
    }

    ui.success(`Serving on http://${config.server.host}:${config.server.port}`);
    ui.info("Press Ctrl+C to stop");

    const signal = await shutdown;
    ui.cancel(`Received ${signal}, shutting down...`);

    await server.close();
    if (scheduler) {
      await scheduler.stop();
    }
    await container.backups.drain();
    closeDatabase();
    logger.info("Shutdown complete");

    return 0;
  } catch (error) {
    ui.error(`Failed to serve: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    closeDatabase();
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("shelfkeeper serve")} - Run the HTTP server

${color.dim("USAGE:")}
  shelfkeeper serve [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./shelfkeeper.config.yaml)
      --no-scheduler      Do not run the scheduled snapshots in this process
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("DESCRIPTION:")}
  Opens (and migrates) the library database, then serves the backup and
  cover endpoints. Scheduled snapshots run in the same process unless
  --no-scheduler is given. On SIGINT or SIGTERM the server stops accepting
  requests and waits for running snapshots before exiting.

${color.dim("EXAMPLES:")}
  shelfkeeper serve
  shelfkeeper serve --database ./library.db --port 8080
`);
}
