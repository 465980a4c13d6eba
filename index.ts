/**
 * lecture-quiz — exam questions from lecture slides
 *
 * Entry point with two independent commands:
 *   generate  PDFs in a slices directory → one JSON question set per lecture
 *   export    JSON question sets → questions / answers / combined text files
 */

import { hideBin } from "yargs/helpers";
import { consoleLogger } from "./src/log.ts";
import { main } from "./src/main.ts";
import { errorMessage } from "./src/result.ts";

main(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    consoleLogger.error(errorMessage(err));
    process.exitCode = 1;
  },
);
