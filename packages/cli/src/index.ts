#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import { TRACKER_VERSION, TrackerError } from "@bench-tracker/core";
import { parseMonitorArgs, runMonitor } from "./commands/monitor.js";
import { runReport } from "./commands/report.js";
import { runArchive } from "./commands/archive.js";
import { runHistory } from "./commands/history.js";
import { runDiff } from "./commands/diff.js";

const program = new Command();

program
  .name("bench-tracker")
  .description("Track and monitor long-running benchmark runs")
  .version(process.env.BENCH_TRACKER_VERSION ?? TRACKER_VERSION)
  .option("--verbose", "Show debug output");

program
  .command("monitor")
  .description("Watch a benchmark's progress, following new runs as they start")
  .argument("[state_dir]", "Run directory or its .tracker directory; 'none' to scan for runs")
  .argument("[refresh_interval]", "Seconds between refreshes")
  .argument("[auto_detect]", "Switch to newer runs as they appear (true/false)")
  .option("--root <dir>", "Directory containing run directories")
  .action(async (stateDir?: string, refreshInterval?: string, autoDetect?: string, options?: { root?: string }) => {
    await execute(() =>
      runMonitor({
        ...parseMonitorArgs(stateDir, refreshInterval, autoDetect),
        root: options?.root,
        verbose: verbose(),
      })
    );
  });

program
  .command("report")
  .description("Print a run's report from a run directory, tracker directory or report file")
  .argument("<path>", "Run directory, .tracker directory or report_<run_id>.json")
  .option("--json", "Print the report as JSON")
  .action(async (path: string, options: { json?: boolean }) => {
    await execute(() => runReport({ path, json: options.json }));
  });

program
  .command("archive")
  .description("Import exported reports into the run history")
  .argument("[root]", "Directory containing run directories")
  .action(async (root?: string) => {
    await execute(() => runArchive({ root, verbose: verbose() }));
  });

program
  .command("history")
  .description("List archived runs, newest first")
  .option("--limit <n>", "Number of runs to show", "20")
  .option("--json", "Output as JSON")
  .action(async (options: { limit: string; json?: boolean }) => {
    await execute(() => runHistory({ limit: parseInt(options.limit, 10), json: options.json }));
  });

program
  .command("diff")
  .description("Compare exercise outcomes between two archived runs")
  .requiredOption("--before <run>", "Base run id, or 'previous'")
  .requiredOption("--after <run>", "Target run id, or 'latest'")
  .option("--json", "Output diff as JSON")
  .action(async (options: { before: string; after: string; json?: boolean }) => {
    await execute(() => runDiff({ before: options.before, after: options.after, json: options.json }));
  });

function verbose(): boolean | undefined {
  const opts: { verbose?: boolean } = program.opts();
  return opts.verbose;
}

async function execute(command: () => Promise<number>): Promise<void> {
  try {
    process.exitCode = await command();
  } catch (e) {
    if (!(e instanceof TrackerError)) throw e;
    console.error(chalk.red(`  ${e.name}: ${e.message}`));
    process.exitCode = 1;
  }
}

await program.parseAsync();
