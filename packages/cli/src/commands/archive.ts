import { resolve } from "node:path";
import chalk from "chalk";
import { SqliteRunHistory, archiveReports } from "@bench-tracker/core";
import { loadConfig, type BenchTrackerConfig } from "../config.js";
import { createConsoleLogger } from "../logger.js";

export interface ArchiveOptions {
  root?: string;
  verbose?: boolean;
  config?: BenchTrackerConfig;
}

export async function runArchive(options: ArchiveOptions): Promise<number> {
  const config = options.config ?? (await loadConfig());
  const root = resolve(options.root ?? config.root);
  const logger = createConsoleLogger({ verbose: options.verbose ?? config.verbose });

  console.log();
  console.log(chalk.bold("  Archiving reports"));
  console.log(chalk.dim(`  ${root} → ${resolve(config.history.path)}`));
  console.log();

  const history = new SqliteRunHistory(resolve(config.history.path));
  try {
    const result = await archiveReports(root, history, { logger });

    for (const runId of result.archived) {
      console.log(`  ${chalk.green("+")} ${runId}`);
    }
    for (const { path, message } of result.unreadable) {
      console.log(`  ${chalk.red("✗")} ${path}: ${chalk.dim(message)}`);
    }

    console.log();
    console.log(
      `  ${result.archived.length} archived` +
        chalk.dim(` · ${result.alreadyArchived.length} already archived · ${result.unreadable.length} unreadable`)
    );
    console.log();
    return result.unreadable.length > 0 ? 1 : 0;
  } finally {
    history.close();
  }
}
