import { stat } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { NotFoundError, PersistenceError, errorMessage, isErrnoException } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import type { Progress, Run } from "../run/types.js";
import { DirectoryScanner } from "../scan/directory-scanner.js";
import { computeStatistics, progressOf } from "../stats/engine.js";
import type { StatisticsSnapshot } from "../stats/engine.js";
import { TRACKER_DIR, TrackerStore } from "../store/tracker-store.js";
import type { RunSnapshotReader } from "../store/tracker-store.js";

export const DEFAULT_REFRESH_INTERVAL_MS = 5000;

export interface MonitorTarget {
  /** Display name: the run directory's name, or the state directory path. */
  label: string;
  runDir: string | null;
  stateDir: string;
}

export type MonitorFrame =
  | {
      kind: "run";
      target: MonitorTarget;
      run: Run;
      statistics: StatisticsSnapshot;
      progress: Progress;
      switchedFrom: string | null;
    }
  | { kind: "waiting"; ticks: number }
  | { kind: "transient"; target: MonitorTarget | null; error: PersistenceError | NotFoundError; ticks: number };

export interface MonitorOptions {
  /** Where run directories are created, e.g. `tmp.benchmarks`. */
  root: string;
  /** A run directory or its `.tracker` directory; otherwise found by scanning. */
  stateDir?: string;
  autoDetect: boolean;
  refreshIntervalMs?: number;
  render: (frame: MonitorFrame) => void;
  scanner?: DirectoryScanner;
  openReader?: (stateDir: string) => RunSnapshotReader;
  logger?: Logger;
}

/**
 * Polls a run's state file and renders it. Strictly a reader: it only ever
 * holds a {@link RunSnapshotReader}, so there is no path from here to a write.
 */
export class Monitor {
  private options: MonitorOptions;
  private scanner: DirectoryScanner;
  private openReader: (stateDir: string) => RunSnapshotReader;
  private logger: Logger;
  private target: MonitorTarget | null = null;
  private reader: RunSnapshotReader | null = null;
  private initialResolved = false;
  private loadedOnce = false;
  private idleTicks = 0;

  constructor(options: MonitorOptions) {
    this.options = options;
    this.scanner = options.scanner ?? new DirectoryScanner();
    this.openReader = options.openReader ?? ((stateDir) => new TrackerStore(stateDir));
    this.logger = options.logger ?? silentLogger;
  }

  get current(): MonitorTarget | null {
    return this.target;
  }

  get refreshIntervalMs(): number {
    return this.options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS;
  }

  /**
   * One poll. Throws NotFoundError only when auto-detect is off and there is
   * nothing to monitor; every other problem comes back as a frame.
   */
  async tick(): Promise<MonitorFrame> {
    let switchedFrom: string | null = null;

    try {
      if (!this.initialResolved) {
        await this.resolveInitialTarget();
        this.initialResolved = true;
      }

      if (this.options.autoDetect) {
        const scan = await this.scanner.findLatest(this.options.root);
        if (scan.status === "found" && this.isNewer(scan.candidate.name, scan.candidate.path)) {
          switchedFrom = this.target?.label ?? null;
          this.switchTo({
            label: scan.candidate.name,
            runDir: scan.candidate.path,
            stateDir: scan.candidate.stateDir,
          });
        }
      }
    } catch (e) {
      if (e instanceof PersistenceError) return this.transient(e);
      throw e;
    }

    if (!this.target || !this.reader) {
      this.idleTicks += 1;
      return { kind: "waiting", ticks: this.idleTicks };
    }

    const result = await this.reader.loadLatest();
    if (result.status === "loaded") {
      this.loadedOnce = true;
      this.idleTicks = 0;
      return {
        kind: "run",
        target: this.target,
        run: result.value,
        statistics: computeStatistics(result.value),
        progress: progressOf(result.value),
        switchedFrom,
      };
    }

    if (result.status === "not-found" && !this.options.autoDetect && !this.loadedOnce) {
      throw result.error;
    }
    return this.transient(result.error);
  }

  /** Tick, render, sleep; returns once `signal` aborts. */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      this.options.render(await this.tick());
      try {
        await sleep(this.refreshIntervalMs, undefined, { signal });
      } catch (e) {
        if (signal?.aborted) break;
        throw e;
      }
    }
    this.logger.debug("Monitor stopped");
  }

  private async resolveInitialTarget(): Promise<void> {
    if (this.options.stateDir) {
      const explicit = await resolveStateDir(this.options.stateDir);
      if (explicit) {
        this.switchTo(explicit);
        return;
      }
      if (!this.options.autoDetect) {
        throw new NotFoundError(`State directory not found: ${this.options.stateDir}`);
      }
      this.logger.warn(`State directory not found: ${this.options.stateDir}; waiting for a run instead`);
      return;
    }

    if (!this.options.autoDetect) {
      const scan = await this.scanner.findLatest(this.options.root);
      if (scan.status === "none") {
        throw new NotFoundError(`No benchmark runs found in ${this.options.root}`);
      }
      this.switchTo({ label: scan.candidate.name, runDir: scan.candidate.path, stateDir: scan.candidate.stateDir });
    }
  }

  private isNewer(name: string, path: string): boolean {
    if (!this.target) return true;
    if (this.target.runDir === resolve(path)) return false;
    // A bare state dir was named explicitly and has no timestamp; stay on it
    if (this.target.runDir === null) return false;
    return name > basename(this.target.runDir);
  }

  private switchTo(target: MonitorTarget): void {
    const normalized: MonitorTarget = {
      label: target.label,
      runDir: target.runDir === null ? null : resolve(target.runDir),
      stateDir: resolve(target.stateDir),
    };
    if (this.target) {
      this.logger.info(`Switching to ${normalized.label} (was ${this.target.label})`);
    }
    this.target = normalized;
    this.reader = this.openReader(normalized.stateDir);
    this.loadedOnce = false;
    this.idleTicks = 0;
  }

  private transient(error: PersistenceError | NotFoundError): MonitorFrame {
    this.idleTicks += 1;
    this.logger.debug(`Transient monitor condition: ${error.message}`);
    return { kind: "transient", target: this.target, error, ticks: this.idleTicks };
  }
}

/**
 * Accepts a run directory or its `.tracker` directory. Any other existing
 * directory is taken as a state directory as-is.
 */
export async function resolveStateDir(path: string): Promise<MonitorTarget | null> {
  const absolute = resolve(path);

  if (basename(absolute) === TRACKER_DIR) {
    if (!(await isDirectory(absolute))) return null;
    const runDir = dirname(absolute);
    return { label: basename(runDir), runDir, stateDir: absolute };
  }

  const nested = join(absolute, TRACKER_DIR);
  if (await isDirectory(nested)) {
    return { label: basename(absolute), runDir: absolute, stateDir: nested };
  }
  if (await isDirectory(absolute)) {
    return { label: absolute, runDir: null, stateDir: absolute };
  }
  return null;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (e) {
    if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "ENOTDIR")) return false;
    throw new PersistenceError(`Cannot stat ${path}: ${errorMessage(e)}`, path, e);
  }
}
