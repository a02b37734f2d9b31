import { link, mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { ZodType, ZodTypeDef } from "zod";
import { ConfigurationError, NotFoundError, PersistenceError, errorMessage, isErrnoException } from "../errors.js";
import { silentLogger } from "../logger.js";
import type { Logger } from "../logger.js";
import { RunSnapshotSchema, fromSnapshot, toSnapshot } from "../run/schema.js";
import type { Run } from "../run/types.js";
import { TrackerReportSchema, generateJsonReport } from "../report/json.js";
import type { TrackerReport } from "../report/json.js";

export const TRACKER_DIR = ".tracker";
export const REPORT_PREFIX = "report_";

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export type LoadResult<T> =
  | { status: "loaded"; value: T; path: string }
  | { status: "not-found"; error: NotFoundError }
  | { status: "unreadable"; error: PersistenceError };

/** The read side of the store. The monitor only ever sees this. */
export interface RunSnapshotReader {
  readonly stateDir: string;
  load(runId: string): Promise<LoadResult<Run>>;
  loadLatest(): Promise<LoadResult<Run>>;
  listRunIds(): Promise<string[]>;
}

export interface TrackerStoreOptions {
  logger?: Logger;
}

export interface SaveOptions {
  /** First write of a run: refuse to replace an existing state file. */
  create?: boolean;
}

export function assertValidRunId(runId: string): void {
  if (!RUN_ID_PATTERN.test(runId) || runId.startsWith(REPORT_PREFIX)) {
    throw new ConfigurationError(
      `Invalid run id "${runId}": use letters, digits, ".", "_" or "-", not starting with "${REPORT_PREFIX}"`
    );
  }
}

export function isStateFileName(fileName: string): boolean {
  return fileName.endsWith(".json") && !fileName.startsWith(".") && !fileName.startsWith(REPORT_PREFIX);
}

/**
 * One run's state lives in `<stateDir>/<run_id>.json` and is always replaced
 * whole: the snapshot goes to a temp file in the same directory and is renamed
 * over the old one, so a reader in another process sees the previous or the
 * next snapshot, never a torn write.
 */
export class TrackerStore implements RunSnapshotReader {
  readonly stateDir: string;
  private logger: Logger;

  constructor(stateDir: string, options?: TrackerStoreOptions) {
    this.stateDir = stateDir;
    this.logger = options?.logger ?? silentLogger;
  }

  static forRunDir(runDir: string, options?: TrackerStoreOptions): TrackerStore {
    return new TrackerStore(join(runDir, TRACKER_DIR), options);
  }

  statePath(runId: string): string {
    assertValidRunId(runId);
    return join(this.stateDir, `${runId}.json`);
  }

  reportPath(runId: string): string {
    assertValidRunId(runId);
    return join(this.stateDir, `${REPORT_PREFIX}${runId}.json`);
  }

  /**
   * With `create`, the snapshot is linked into place instead of renamed, so the
   * write fails with a ConfigurationError when the run already has a state file.
   */
  async save(run: Run, options?: SaveOptions): Promise<void> {
    const path = this.statePath(run.runId);
    const tmp = this.tempPath(run.runId);

    try {
      await mkdir(this.stateDir, { recursive: true });
      await writeFile(tmp, JSON.stringify(toSnapshot(run), null, 2), "utf-8");
      if (options?.create) {
        await link(tmp, path);
      } else {
        await rename(tmp, path);
      }
    } catch (e) {
      if (options?.create && isErrnoException(e) && e.code === "EEXIST") {
        throw new ConfigurationError(`Run "${run.runId}" already exists in ${this.stateDir}`, e);
      }
      throw new PersistenceError(`Failed to write state for run "${run.runId}": ${errorMessage(e)}`, path, e);
    } finally {
      await this.discard(tmp);
    }
    this.logger.debug(`Saved state for ${run.runId} → ${path}`);
  }

  async load(runId: string): Promise<LoadResult<Run>> {
    const result = await this.readJson(this.statePath(runId), RunSnapshotSchema, `state for run "${runId}"`);
    if (result.status !== "loaded") return result;

    if (result.value.run_id !== runId) {
      return {
        status: "unreadable",
        error: new PersistenceError(
          `State file for "${runId}" holds run "${result.value.run_id}"`,
          result.path
        ),
      };
    }
    return { status: "loaded", value: fromSnapshot(result.value), path: result.path };
  }

  /** The most recently written state file in the directory. */
  async loadLatest(): Promise<LoadResult<Run>> {
    let runIds: string[];
    try {
      runIds = await this.listRunIds();
    } catch (e) {
      if (e instanceof PersistenceError) return { status: "unreadable", error: e };
      throw e;
    }

    let latest: { runId: string; mtimeMs: number } | undefined;
    for (const runId of runIds) {
      let mtimeMs: number;
      try {
        mtimeMs = (await stat(this.statePath(runId))).mtimeMs;
      } catch (e) {
        if (isErrnoException(e) && e.code === "ENOENT") continue;
        return {
          status: "unreadable",
          error: new PersistenceError(`Cannot stat state for "${runId}": ${errorMessage(e)}`, this.statePath(runId), e),
        };
      }
      if (!latest || mtimeMs > latest.mtimeMs || (mtimeMs === latest.mtimeMs && runId > latest.runId)) {
        latest = { runId, mtimeMs };
      }
    }

    if (!latest) {
      return { status: "not-found", error: new NotFoundError(`No benchmark state in ${this.stateDir}`) };
    }
    return this.load(latest.runId);
  }

  async listRunIds(): Promise<string[]> {
    return (await this.listEntries())
      .filter(isStateFileName)
      .map((name) => name.slice(0, -".json".length))
      .filter((runId) => RUN_ID_PATTERN.test(runId))
      .sort();
  }

  async listReportIds(): Promise<string[]> {
    return (await this.listEntries())
      .filter((name) => name.startsWith(REPORT_PREFIX) && name.endsWith(".json"))
      .map((name) => name.slice(REPORT_PREFIX.length, -".json".length))
      .filter((runId) => RUN_ID_PATTERN.test(runId))
      .sort();
  }

  async exists(runId: string): Promise<boolean> {
    try {
      await stat(this.statePath(runId));
      return true;
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return false;
      throw new PersistenceError(`Cannot stat state for "${runId}": ${errorMessage(e)}`, this.statePath(runId), e);
    }
  }

  /**
   * Writes `report_<run_id>.json` once. The hard link fails when the report
   * already exists, so an exported report is never replaced.
   */
  async exportReport(report: TrackerReport): Promise<string> {
    const runId = report.run.run_id;
    const path = this.reportPath(runId);
    const tmp = this.tempPath(`${REPORT_PREFIX}${runId}`);

    try {
      await mkdir(this.stateDir, { recursive: true });
      await writeFile(tmp, generateJsonReport(report), "utf-8");
      await link(tmp, path);
    } catch (e) {
      if (isErrnoException(e) && e.code === "EEXIST") {
        throw new ConfigurationError(`A report for run "${runId}" was already exported to ${path}`, e);
      }
      throw new PersistenceError(`Failed to export report for run "${runId}": ${errorMessage(e)}`, path, e);
    } finally {
      await this.discard(tmp);
    }

    this.logger.info(`Exported report → ${path}`);
    return path;
  }

  async loadReport(runId: string): Promise<LoadResult<TrackerReport>> {
    return this.readJson(this.reportPath(runId), TrackerReportSchema, `report for run "${runId}"`);
  }

  private async readJson<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    what: string
  ): Promise<LoadResult<T>> {
    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") {
        return { status: "not-found", error: new NotFoundError(`No ${what} at ${path}`, e) };
      }
      return { status: "unreadable", error: new PersistenceError(`Cannot read ${what}: ${errorMessage(e)}`, path, e) };
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (e) {
      return { status: "unreadable", error: new PersistenceError(`Corrupt ${what}: ${errorMessage(e)}`, path, e) };
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
      return {
        status: "unreadable",
        error: new PersistenceError(`Invalid ${what}${where}: ${issue?.message ?? parsed.error.message}`, path, parsed.error),
      };
    }
    return { status: "loaded", value: parsed.data, path };
  }

  private async listEntries(): Promise<string[]> {
    try {
      return await readdir(this.stateDir);
    } catch (e) {
      if (isErrnoException(e) && e.code === "ENOENT") return [];
      throw new PersistenceError(`Cannot list ${this.stateDir}: ${errorMessage(e)}`, this.stateDir, e);
    }
  }

  private tempPath(baseName: string): string {
    return join(this.stateDir, `.${baseName}.json.${process.pid}.${randomUUID().slice(0, 8)}.tmp`);
  }

  private async discard(tmp: string): Promise<void> {
    try {
      await rm(tmp, { force: true });
    } catch (e) {
      this.logger.warn(`Could not remove temp file ${tmp}: ${errorMessage(e)}`);
    }
  }
}
