/**
 * Console output for both pipelines.
 *
 * Everything the tool reports goes through a Logger so tests can record
 * messages instead of printing them.
 */

import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  success: (message) => console.log(chalk.green(message)),
  warn: (message) => console.warn(chalk.yellow(`Warning: ${message}`)),
  error: (message) => console.error(chalk.red(`Error: ${message}`)),
};
