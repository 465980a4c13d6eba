/**
 * Command dispatch for the two pipelines.
 */

import { runGenerate } from "./batch.ts";
import { parseExportArgs, parseGenerateArgs } from "./bootstrap/args.ts";
import { MODEL_CATALOG, loadConfig } from "./config.ts";
import { runExport } from "./export/index.ts";
import { type Logger, consoleLogger } from "./log.ts";

export const USAGE = [
  "Usage: lecture-quiz <command> [options]",
  "",
  "Commands:",
  "  generate   Generate exam questions from lecture PDFs",
  "  export     Write numbered text files from generated questions",
  "",
  "Run lecture-quiz <command> --help for options.",
].join("\n");

/** Run one command and return its exit code. `argv` starts at the command name. */
export async function main(argv: string[], log: Logger = consoleLogger): Promise<number> {
  const [command, ...rest] = argv;

  switch (command) {
    case "generate": {
      const options = await parseGenerateArgs(rest);
      const config = await loadConfig(log);
      return runGenerate(options, { models: MODEL_CATALOG, config, log });
    }

    case "export":
      return runExport(await parseExportArgs(rest), log);

    default:
      if (command) log.error(`Unknown command: ${command}`);
      log.info(USAGE);
      return 1;
  }
}
