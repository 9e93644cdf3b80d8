import type { ExecutionContext, ExecutionMode } from "@apphost/sdk";
import yargs from "yargs";
import { AppHostError } from "./types.js";

const PUBLISHERS = ["manifest"];

export function executionContextFor(
  mode: ExecutionMode,
  options: { publisher?: string; outputPath?: string } = {},
): ExecutionContext {
  return Object.freeze({
    mode,
    isRunMode: mode === "run",
    isPublishMode: mode === "publish",
    publisher: mode === "publish" ? (options.publisher ?? "manifest") : undefined,
    outputPath: options.outputPath,
  });
}

/**
 * Reads the execution mode from startup args. `--publisher manifest` selects
 * publish mode; everything else the host does not recognise is ignored.
 */
export function createExecutionContext(args: readonly string[] = []): ExecutionContext {
  const argv = yargs([...args])
    .option("publisher", { type: "string" })
    .option("output-path", { type: "string" })
    .help(false)
    .version(false)
    .exitProcess(false)
    .parseSync();

  const publisher = argv.publisher;
  if (publisher === undefined) {
    return executionContextFor("run");
  }
  if (!PUBLISHERS.includes(publisher)) {
    throw new AppHostError(
      "ERR_UNKNOWN_PUBLISHER",
      `Unknown publisher "${publisher}". Supported publishers: ${PUBLISHERS.join(", ")}`,
    );
  }
  return executionContextFor("publish", { publisher, outputPath: argv["output-path"] });
}
