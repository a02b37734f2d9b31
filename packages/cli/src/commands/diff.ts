import { resolve } from "node:path";
import chalk from "chalk";
import Table from "cli-table3";
import {
  SqliteRunHistory,
  checkRegressions,
  resolveRunRef,
  truncate,
  type DiffReport,
  type DiffStatus,
  type ExerciseDiff,
} from "@bench-tracker/core";
import { loadConfig, type BenchTrackerConfig } from "../config.js";

export interface DiffOptions {
  before: string;
  after: string;
  json?: boolean;
  config?: BenchTrackerConfig;
}

export async function runDiff(options: DiffOptions): Promise<number> {
  const config = options.config ?? (await loadConfig());
  const history = new SqliteRunHistory(resolve(config.history.path));

  try {
    const beforeRun = resolveRunRef(history, options.before);
    const afterRun = resolveRunRef(history, options.after);
    const result = checkRegressions(history, beforeRun, afterRun);

    if (options.json) {
      console.log(JSON.stringify(result.diff, null, 2));
    } else {
      printDiffTable(result.diff);
    }
    return result.exitCode;
  } finally {
    history.close();
  }
}

function printDiffTable(diff: DiffReport): void {
  console.log();
  console.log(chalk.bold(`  Comparing: ${diff.beforeRun} → ${diff.afterRun}`));
  console.log();

  const table = new Table({
    head: [
      chalk.bold("Exercise"),
      chalk.bold(diff.beforeRun),
      chalk.bold(diff.afterRun),
      chalk.bold("Attempts"),
      chalk.bold("Status"),
    ],
    style: { head: [], border: [] },
  });

  for (const e of diff.exercises) {
    table.push(formatDiffRow(e));
  }

  console.log(table.toString());
  console.log();

  const parts = [
    `${diff.summary.total} exercises`,
    diff.summary.stable > 0 ? chalk.dim(`${diff.summary.stable} stable`) : null,
    diff.summary.improvements > 0 ? chalk.green(`${diff.summary.improvements} improved`) : null,
    diff.summary.regressions > 0 ? chalk.red(`${diff.summary.regressions} regressed`) : null,
    diff.summary.added > 0 ? chalk.yellow(`${diff.summary.added} added`) : null,
    diff.summary.removed > 0 ? chalk.yellow(`${diff.summary.removed} removed`) : null,
  ]
    .filter(Boolean)
    .join(chalk.dim(" · "));

  console.log(`  ${parts}`);

  if (diff.hasRegressions) {
    console.log();
    console.log(chalk.red.bold(`  ⚠ ${diff.summary.regressions} regression(s) detected`));
  }
  console.log();
}

function formatDiffRow(e: ExerciseDiff): string[] {
  const beforeCol = e.before ? formatState(e.before.state) : chalk.dim("—");
  const afterCol = e.after ? formatState(e.after.state) : chalk.dim("—");

  let attemptsCol: string;
  if (e.attemptsDelta === undefined) {
    attemptsCol = chalk.yellow(e.status === "added" ? "new" : "removed");
  } else if (e.attemptsDelta === 0) {
    attemptsCol = chalk.dim("—");
  } else {
    attemptsCol = e.attemptsDelta > 0 ? chalk.red(`+${e.attemptsDelta}`) : chalk.green(`${e.attemptsDelta}`);
  }

  return [truncate(e.exercise, 40), beforeCol, afterCol, attemptsCol, formatStatus(e.status)];
}

function formatState(state: string): string {
  if (state === "passed") return chalk.green("PASS");
  if (state === "failed" || state === "error") return chalk.red(state.toUpperCase());
  return chalk.dim(state);
}

function formatStatus(status: DiffStatus): string {
  switch (status) {
    case "regression":
      return chalk.red.bold("REGRESSED");
    case "improvement":
      return chalk.green("improved");
    case "stable":
      return chalk.dim("stable");
    case "added":
      return chalk.yellow("added");
    case "removed":
      return chalk.yellow("removed");
  }
}
