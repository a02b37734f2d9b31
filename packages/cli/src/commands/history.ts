import { resolve } from "node:path";
import chalk from "chalk";
import Table from "cli-table3";
import { ConfigurationError, SqliteRunHistory, type HistoryEntry } from "@bench-tracker/core";
import { loadConfig, type BenchTrackerConfig } from "../config.js";

export interface HistoryOptions {
  limit?: number;
  json?: boolean;
  config?: BenchTrackerConfig;
}

export async function runHistory(options: HistoryOptions): Promise<number> {
  if (options.limit !== undefined && (!Number.isInteger(options.limit) || options.limit <= 0)) {
    throw new ConfigurationError("--limit must be a positive integer");
  }
  const config = options.config ?? (await loadConfig());
  const history = new SqliteRunHistory(resolve(config.history.path));

  try {
    const runs = history.listRuns(options.limit);
    if (options.json) {
      console.log(JSON.stringify(runs, null, 2));
      return 0;
    }

    console.log();
    if (runs.length === 0) {
      console.log(chalk.yellow("  No archived runs."));
      console.log(chalk.dim("  Run `bench-tracker archive` after a benchmark exports its report."));
      console.log();
      return 0;
    }

    console.log(renderHistoryTable(runs));
    console.log();
    return 0;
  } finally {
    history.close();
  }
}

export function renderHistoryTable(runs: HistoryEntry[]): string {
  const table = new Table({
    head: ["Run", "Model", "State", "Started", "Passed", "Pass rate", "Cost"].map((h) => chalk.bold(h)),
    style: { head: [], border: [] },
  });

  for (const run of runs) {
    table.push([
      run.runId,
      run.model,
      run.state,
      run.startedAt ?? "—",
      `${run.passed}/${run.totalExercises}`,
      `${run.passRate.toFixed(2)}%`,
      `$${run.totalCost.toFixed(4)}`,
    ]);
  }
  return table.toString();
}
