import { resolve } from "node:path";
import chalk from "chalk";
import { ConfigurationError, Monitor, NotFoundError, renderMonitorFrame, type MonitorFrame } from "@bench-tracker/core";
import { loadConfig, type BenchTrackerConfig } from "../config.js";
import { createConsoleLogger } from "../logger.js";

export interface MonitorCommandOptions {
  stateDir?: string;
  /** Seconds. */
  refreshInterval?: number;
  autoDetect?: boolean;
  root?: string;
  verbose?: boolean;
  config?: BenchTrackerConfig;
  /** Stops the loop; SIGINT/SIGTERM are wired up when absent. */
  signal?: AbortSignal;
  output?: (frame: string) => void;
}

/**
 * Positional form `[state_dir] [refresh_interval] [auto_detect]`. A state dir
 * of "none" means scan for runs.
 */
export function parseMonitorArgs(
  stateDir: string | undefined,
  refreshInterval: string | undefined,
  autoDetect: string | undefined
): Pick<MonitorCommandOptions, "stateDir" | "refreshInterval" | "autoDetect"> {
  const parsed: Pick<MonitorCommandOptions, "stateDir" | "refreshInterval" | "autoDetect"> = {};

  if (stateDir !== undefined && stateDir.toLowerCase() !== "none") {
    parsed.stateDir = stateDir;
  }

  if (refreshInterval !== undefined) {
    const seconds = Number(refreshInterval);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      throw new ConfigurationError(`Invalid refresh interval "${refreshInterval}": expected a positive number of seconds`);
    }
    parsed.refreshInterval = seconds;
  }

  if (autoDetect !== undefined) {
    parsed.autoDetect = parseBoolean(autoDetect);
  }
  return parsed;
}

export async function runMonitor(options: MonitorCommandOptions): Promise<number> {
  const config = options.config ?? (await loadConfig());
  const logger = createConsoleLogger({ verbose: options.verbose ?? config.verbose });
  // An explicit directory pins the monitor to it unless asked otherwise
  const autoDetect = options.autoDetect ?? (options.stateDir === undefined && config.monitor.autoDetect);
  const refreshIntervalMs = Math.round((options.refreshInterval ?? config.monitor.refreshInterval) * 1000);
  const output =
    options.output ??
    ((frame: string) => {
      console.clear();
      console.log(frame);
    });

  const monitor = new Monitor({
    root: resolve(options.root ?? config.root),
    stateDir: options.stateDir,
    autoDetect,
    refreshIntervalMs,
    logger,
    render: (frame: MonitorFrame) => output(renderMonitorFrame(frame, { autoDetect, refreshIntervalMs })),
  });

  const controller = new AbortController();
  const stop = () => controller.abort();
  if (options.signal) {
    if (options.signal.aborted) stop();
    options.signal.addEventListener("abort", stop, { once: true });
  } else {
    process.once("SIGINT", stop);
    process.once("SIGTERM", stop);
  }

  try {
    await monitor.run(controller.signal);
    console.log(chalk.dim("\n  Monitor stopped."));
    return 0;
  } catch (e) {
    if (e instanceof NotFoundError) {
      console.error(chalk.red(`  ${e.message}`));
      return 1;
    }
    throw e;
  } finally {
    options.signal?.removeEventListener("abort", stop);
    process.off("SIGINT", stop);
    process.off("SIGTERM", stop);
  }
}

function parseBoolean(value: string): boolean {
  switch (value.toLowerCase()) {
    case "true":
    case "yes":
    case "1":
    case "on":
      return true;
    case "false":
    case "no":
    case "0":
    case "off":
      return false;
    default:
      throw new ConfigurationError(`Invalid auto_detect value "${value}": expected true or false`);
  }
}
