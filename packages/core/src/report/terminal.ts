import chalk from "chalk";
import Table from "cli-table3";
import type { MonitorFrame } from "../monitor/monitor.js";
import type { RunState } from "../run/types.js";
import type { LanguageStatistics, StatisticsSnapshot } from "../stats/engine.js";
import type { TrackerReport } from "./json.js";

const BAR_WIDTH = 30;

export interface FrameRenderOptions {
  autoDetect: boolean;
  refreshIntervalMs: number;
}

export function renderMonitorFrame(frame: MonitorFrame, options: FrameRenderOptions): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(
    chalk.bold("  Benchmark Monitor") + (options.autoDetect ? chalk.dim("  (auto-detecting new runs)") : "")
  );
  lines.push(chalk.dim("  " + "─".repeat(50)));
  lines.push("");

  switch (frame.kind) {
    case "waiting":
      lines.push(chalk.yellow(`  Waiting for a benchmark to start${".".repeat(frame.ticks % 4)}`));
      lines.push(chalk.dim("  No run directory with tracker state found yet."));
      break;
    case "transient":
      if (frame.target) lines.push(`  Monitoring: ${frame.target.label}`);
      lines.push(chalk.yellow(`  ${frame.error.message}`));
      lines.push(chalk.dim("  Will retry on the next refresh."));
      break;
    case "run": {
      const { run, statistics, progress } = frame;
      if (frame.switchedFrom) {
        lines.push(chalk.cyan(`  Switched to new benchmark: ${frame.target.label} (was ${frame.switchedFrom})`));
        lines.push("");
      }
      lines.push(`  Run:        ${chalk.bold(run.runId)}`);
      if (frame.target.runDir) lines.push(`  Directory:  ${frame.target.label}`);
      lines.push(`  State:      ${formatRunState(run.state)}`);
      lines.push(`  Model:      ${run.model}`);
      lines.push(`  Languages:  ${run.languages.join(", ")}`);
      if (run.currentExercise) lines.push(`  Current:    ${run.currentExercise}`);
      lines.push("");
      lines.push(
        `  Progress    ${progressBar(progress.completed, progress.total)} ${progress.completed}/${progress.total} (${progress.percentage}%)`
      );
      lines.push(...renderStatistics(statistics));
      break;
    }
  }

  lines.push("");
  lines.push(
    chalk.dim(
      `  [${options.autoDetect ? "Auto-refresh" : "Refreshing"} every ${formatDuration(options.refreshIntervalMs)}, Ctrl+C to exit]`
    )
  );
  return lines.join("\n");
}

export function printTrackerReport(report: TrackerReport): void {
  const { run, statistics, progress } = report;

  console.log();
  console.log(chalk.bold(`  Benchmark Report — ${run.run_id}`));
  console.log(chalk.dim("  " + "─".repeat(50)));
  console.log(`  Model:      ${run.model}`);
  console.log(`  State:      ${formatRunState(run.state)}`);
  console.log(`  Started:    ${run.started_at ?? "—"}`);
  console.log(`  Finished:   ${run.completed_at ?? "—"}`);
  console.log(`  Progress    ${progressBar(progress.completed, progress.total)} ${progress.completed}/${progress.total}`);
  for (const line of renderStatistics(statistics)) console.log(line);

  const unsuccessful = Object.entries(run.exercises).filter(
    ([, exercise]) => exercise.state === "failed" || exercise.state === "error"
  );
  if (unsuccessful.length > 0) {
    console.log();
    console.log(chalk.red.bold("  Failures:"));
    for (const [key, exercise] of unsuccessful) {
      const attempts = chalk.dim(`(${exercise.attempts}/${exercise.max_attempts} attempts)`);
      console.log(chalk.red(`  ✗ ${key} `) + attempts);
      if (exercise.error_message) console.log(chalk.dim(`    ${exercise.error_message}`));
    }
  }
  console.log();
}

function renderStatistics(stats: StatisticsSnapshot): string[] {
  const lines: string[] = [];
  const counts = [
    chalk.green(`${stats.passed} passed`),
    chalk.red(`${stats.failed} failed`),
    stats.skipped > 0 ? chalk.yellow(`${stats.skipped} skipped`) : null,
    stats.errored > 0 ? chalk.red(`${stats.errored} errors`) : null,
  ]
    .filter(Boolean)
    .join(chalk.dim(" · "));
  lines.push(`  ${counts}`);
  lines.push(`  Pass rate   ${formatRate(stats.passRate)} ${chalk.dim(`(success rate ${stats.successRate}%)`)}`);

  if (stats.estimatedRemainingMs !== null && stats.completed < stats.totalExercises) {
    lines.push(`  Remaining   ~${formatDuration(stats.estimatedRemainingMs)}`);
  }
  if (stats.averageDurationMs !== null) {
    lines.push(chalk.dim(`  Avg exercise ${formatDuration(stats.averageDurationMs)}`));
  }

  const languages = Object.entries(stats.byLanguage);
  if (languages.length > 0) {
    lines.push("");
    lines.push(renderLanguageTable(languages));
  }

  if (stats.totalCost > 0 || stats.totalTokens > 0) {
    lines.push("");
    lines.push(`  Cost        $${stats.totalCost.toFixed(4)} ${chalk.dim(`($${stats.avgCostPerExercise.toFixed(4)}/exercise)`)}`);
    lines.push(`  Tokens      ${stats.totalTokens.toLocaleString("en-US")}`);
  }

  const errorCounters = Object.entries(stats.errorCounters).filter(([, count]) => count > 0);
  if (errorCounters.length > 0) {
    lines.push(chalk.yellow(`  ${errorCounters.map(([key, count]) => `${key}: ${count}`).join(" · ")}`));
  }
  return lines;
}

function renderLanguageTable(languages: [string, LanguageStatistics][]): string {
  const table = new Table({
    head: [
      chalk.bold("Language"),
      chalk.bold("Done"),
      chalk.bold("Passed"),
      chalk.bold("Failed"),
      chalk.bold("Pass rate"),
    ],
    style: { head: [], border: [] },
    colWidths: [16, 8, 9, 9, 11],
  });

  for (const [language, stats] of languages) {
    table.push([
      truncate(language, 14),
      `${stats.completed}/${stats.total}`,
      chalk.green(String(stats.passed)),
      stats.failed + stats.errored > 0 ? chalk.red(String(stats.failed + stats.errored)) : "0",
      formatRate(stats.passRate),
    ]);
  }
  return table.toString();
}

export function progressBar(completed: number, total: number, width = BAR_WIDTH): string {
  const filled = Math.min(width, Math.floor((width * completed) / Math.max(total, 1)));
  return "[" + "█".repeat(filled) + "░".repeat(width - filled) + "]";
}

function formatRate(rate: number): string {
  if (rate >= 80) return chalk.green(`${rate}%`);
  if (rate >= 60) return chalk.yellow(`${rate}%`);
  return chalk.red(`${rate}%`);
}

function formatRunState(state: RunState): string {
  const label = state.toUpperCase();
  switch (state) {
    case "completed":
      return chalk.green(label);
    case "failed":
    case "cancelled":
      return chalk.red(label);
    case "paused":
      return chalk.yellow(label);
    case "initializing":
    case "running":
      return chalk.cyan(label);
  }
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const totalSeconds = Math.round(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m ${seconds}s`;
}

export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max - 1) + "…";
}
