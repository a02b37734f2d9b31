import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { stripVTControlCharacters } from "node:util";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BenchmarkTracker, ConfigurationError, TrackerStore } from "@bench-tracker/core";
import { parseConfig } from "../config.js";
import { parseMonitorArgs, runMonitor } from "../commands/monitor.js";
import { loadReportFor } from "../commands/report.js";

describe("parseMonitorArgs", () => {
  it("treats 'none' as no state directory", () => {
    expect(parseMonitorArgs("none", "2", "false")).toEqual({ refreshInterval: 2, autoDetect: false });
    expect(parseMonitorArgs("runs/2025-01-01--a", undefined, undefined)).toEqual({
      stateDir: "runs/2025-01-01--a",
    });
    expect(parseMonitorArgs(undefined, "0.5", "yes")).toEqual({ refreshInterval: 0.5, autoDetect: true });
  });

  it("rejects a bad interval or flag", () => {
    expect(() => parseMonitorArgs("none", "0", undefined)).toThrow(ConfigurationError);
    expect(() => parseMonitorArgs("none", "soon", undefined)).toThrow(ConfigurationError);
    expect(() => parseMonitorArgs("none", "5", "maybe")).toThrow(ConfigurationError);
  });
});

describe("commands", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "bench-tracker-cli-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  async function startRun(dirName: string): Promise<BenchmarkTracker> {
    const tracker = new BenchmarkTracker({ store: TrackerStore.forRunDir(join(root, dirName)) });
    await tracker.startRun({ runId: "r1", model: "test-model", languages: ["python"], totalExercises: 2 });
    await tracker.startExercise("a", "python");
    await tracker.completeExercise("a", "python", true, { cost: 0.01 });
    return tracker;
  }

  it("monitor exits 1 when auto-detect is off and nothing is there", async () => {
    const code = await runMonitor({
      config: parseConfig({ root }),
      stateDir: join(root, "missing"),
      autoDetect: false,
      signal: new AbortController().signal,
    });
    expect(code).toBe(1);
  });

  it("monitor renders the run and exits 0 once stopped", async () => {
    await startRun("2025-01-01--a");
    const controller = new AbortController();
    const frames: string[] = [];

    const code = await runMonitor({
      config: parseConfig({ root }),
      signal: controller.signal,
      output: (frame) => {
        frames.push(stripVTControlCharacters(frame));
        controller.abort();
      },
    });

    expect(code).toBe(0);
    expect(frames).toHaveLength(1);
    expect(frames[0]?.split("\n")).toContain("  Run:        r1");
  });

  it("report falls back to live state until a report is exported", async () => {
    const tracker = await startRun("2025-01-01--a");
    const runDir = join(root, "2025-01-01--a");

    const live = await loadReportFor(runDir);
    expect(live.status === "loaded" ? live.exported : null).toBe(false);

    const path = await tracker.exportReport();
    const exported = await loadReportFor(runDir);
    expect(exported.status === "loaded" ? exported.exported : null).toBe(true);
    expect(exported.status === "loaded" ? exported.value.statistics.passRate : null).toBe(50);

    const byFile = await loadReportFor(path);
    expect(byFile.status === "loaded" ? byFile.value.run.run_id : null).toBe("r1");
  });

  it("report is not found for an empty directory", async () => {
    const result = await loadReportFor(root);
    expect(result.status).toBe("not-found");
  });
});
