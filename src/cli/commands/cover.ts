import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import { parseArgs } from "node:util";
import { INLINE_CONFIG_OPTIONS } from "../../config/loader";
import { errorMessage } from "../../core/errors";
import { closeDatabase, initDatabase } from "../../db";
import { createContainer } from "../../server/container";
import { formatBytes } from "../../utils/format";
import { INLINE_OPTIONS_HELP, loadCommandConfig } from "../config";
import { color, ui } from "../ui";

export async function coverCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      output: { type: "string", short: "o" },
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

  const localnumber = positionals[0];
  if (!localnumber) {
    ui.error("Specify the book's local number");
    return 1;
  }

  try {
    const config = await loadCommandConfig(values);
    if (!config) return 1;

    await initDatabase(config.database.path);

    try {
      const { covers } = createContainer(config);
      const outcome = await covers.get(localnumber);

      if (!outcome.success) {
        const hint = outcome.error.transient ? color.dim(" (try again shortly)") : "";
        ui.error(`${outcome.error.kind}: ${outcome.error.message}${hint}`);
        return 1;
      }

      const target = path.resolve(values.output ?? `${localnumber}.jpg`);
      await writeFile(target, outcome.value.data);

      ui.success(
        `Cover for ${localnumber} written to ${target} (${formatBytes(outcome.value.data.length)}, from ${outcome.value.source})`,
      );
      return 0;
    } finally {
      closeDatabase();
    }
  } catch (error) {
    ui.error(`Cover failed: ${errorMessage(error)}`);
    if (values.verbose) {
      console.error(error);
    }
    return 1;
  }
}

function printHelp(): void {
  console.log(`
${color.bold("shelfkeeper cover")} - Get a book's cover image

${color.dim("USAGE:")}
  shelfkeeper cover <LOCALNUMBER> [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./shelfkeeper.config.yaml)
  -o, --output <file>     Where to write the image (default: ./<LOCALNUMBER>.jpg)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("INLINE CONFIG OPTIONS:")}
${INLINE_OPTIONS_HELP}

${color.dim("DESCRIPTION:")}
  Uses the cached cover when there is one, otherwise downloads it from the
  cover service by ISBN and caches it. Books the service has no cover for
  are remembered and never looked up again.
`);
}
