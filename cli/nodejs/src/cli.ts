#!/usr/bin/env node

import { AppHostError } from "@apphost/runtime";
import type { RuntimeEvent } from "@apphost/sdk";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { envCommand, manifestCommand } from "./commands.js";
import { createLogger, type Logger } from "./logger.js";

function eventPrinter(log: Logger): ((event: RuntimeEvent) => void) | undefined {
  if (!log.verbose) {
    return undefined;
  }
  return (event) => {
    console.error(log.dim(`${event.name}: ${JSON.stringify(event.payload ?? {})}`));
  };
}

async function execute(log: Logger, action: () => Promise<string>): Promise<void> {
  try {
    log.info(await action());
  } catch (error) {
    if (error instanceof AppHostError) {
      console.error(log.error(`${error.code}: ${error.message}`));
    } else {
      console.error(log.error("Error:"), error instanceof Error ? error.stack : String(error));
    }
    process.exitCode = 1;
  }
}

await yargs(hideBin(process.argv))
  .scriptName("apphost")
  .usage("$0 <command> [options]")
  .option("verbose", {
    type: "boolean",
    default: false,
    describe: "Print runtime events",
  })
  .command(
    "manifest <path> [resource]",
    "Print the publish manifest of an app definition, or of one of its resources",
    (yargs) =>
      yargs
        .positional("path", {
          describe: "Path to the YAML app definition",
          type: "string",
          demandOption: true,
        })
        .positional("resource", {
          describe: "Only render this resource",
          type: "string",
        })
        .option("output-path", {
          type: "string",
          describe: "Write the whole manifest to this file or directory",
        }),
    async (argv) => {
      const log = createLogger(argv.verbose);
      await execute(log, async () => {
        const output = await manifestCommand({
          path: argv.path,
          resource: argv.resource,
          outputPath: argv.outputPath,
          onEvent: eventPrinter(log),
        });
        return argv.outputPath !== undefined && argv.resource === undefined
          ? log.ok(`Manifest written to ${output}`)
          : output;
      });
    },
  )
  .command(
    "env <path> <resource>",
    "Allocate endpoints and print the run-mode environment of a resource",
    (yargs) =>
      yargs
        .positional("path", {
          describe: "Path to the YAML app definition",
          type: "string",
          demandOption: true,
        })
        .positional("resource", {
          describe: "Resource whose environment is printed",
          type: "string",
          demandOption: true,
        })
        .option("host", {
          type: "string",
          default: "localhost",
          describe: "Host assigned to every endpoint",
        })
        .option("base-port", {
          type: "number",
          default: 49152,
          describe: "First port handed to endpoints without a fixed port",
        }),
    async (argv) => {
      const log = createLogger(argv.verbose);
      await execute(log, () =>
        envCommand({
          path: argv.path,
          resource: argv.resource,
          host: argv.host,
          basePort: argv.basePort,
          onEvent: eventPrinter(log),
        }),
      );
    },
  )
  .demandCommand(1, "Please specify a command")
  .strict()
  .help()
  .version()
  .parseAsync();
