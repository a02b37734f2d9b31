import { basename, dirname, resolve } from "node:path";
import chalk from "chalk";
import {
  REPORT_PREFIX,
  TrackerStore,
  buildTrackerReport,
  computeStatistics,
  generateJsonReport,
  printTrackerReport,
  progressOf,
  resolveStateDir,
  type LoadResult,
  type Run,
  type TrackerReport,
} from "@bench-tracker/core";

export interface ReportOptions {
  path: string;
  json?: boolean;
}

/**
 * Prints the exported report for a run. Without an exported report the live
 * state is summarised instead, so this also works while a run is in flight.
 */
export async function runReport(options: ReportOptions): Promise<number> {
  const result = await loadReportFor(resolve(options.path));
  if (result.status !== "loaded") {
    console.error(chalk.red(`  ${result.error.message}`));
    return 1;
  }

  if (options.json) {
    console.log(generateJsonReport(result.value));
  } else {
    printTrackerReport(result.value);
    if (!result.exported) {
      console.log(chalk.dim("  (live state, no report exported yet)"));
      console.log();
    }
  }
  return 0;
}

export type ReportLoad =
  | { status: "loaded"; value: TrackerReport; path: string; exported: boolean }
  | Exclude<LoadResult<TrackerReport>, { status: "loaded" }>;

export async function loadReportFor(path: string): Promise<ReportLoad> {
  if (path.endsWith(".json")) {
    const store = new TrackerStore(dirname(path));
    const fileName = basename(path, ".json");
    if (fileName.startsWith(REPORT_PREFIX)) {
      const report = await store.loadReport(fileName.slice(REPORT_PREFIX.length));
      return report.status === "loaded" ? { ...report, exported: true } : report;
    }
    return fromLiveState(await store.load(fileName));
  }

  const target = await resolveStateDir(path);
  const store = new TrackerStore(target?.stateDir ?? path);
  const latest = await store.loadLatest();
  if (latest.status !== "loaded") return latest;

  const report = await store.loadReport(latest.value.runId);
  if (report.status === "loaded") return { ...report, exported: true };
  if (report.status === "unreadable") return report;
  return fromLiveState(latest);
}

function fromLiveState(result: LoadResult<Run>): ReportLoad {
  if (result.status !== "loaded") return result;
  const run = result.value;
  return {
    status: "loaded",
    value: buildTrackerReport(run, progressOf(run), computeStatistics(run)),
    path: result.path,
    exported: false,
  };
}
