import chalk from "chalk";
import type { Logger } from "@bench-tracker/core";

/** Console logger for the CLI. Debug lines only show with `--verbose`. */
export function createConsoleLogger(options: { verbose: boolean }): Logger {
  return {
    debug: (message) => {
      if (options.verbose) console.error(chalk.dim(`  ${message}`));
    },
    info: (message) => console.error(chalk.cyan(`  ${message}`)),
    warn: (message) => console.error(chalk.yellow(`  Warning: ${message}`)),
    error: (message) => console.error(chalk.red(`  Error: ${message}`)),
  };
}
