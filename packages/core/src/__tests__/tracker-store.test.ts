import { mkdir, readdir, rm, utimes, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TrackerStore } from "../store/tracker-store.js";
import { ConfigurationError, NotFoundError, PersistenceError } from "../errors.js";
import { toSnapshot } from "../run/schema.js";
import { buildTrackerReport } from "../report/json.js";
import { computeStatistics, progressOf } from "../stats/engine.js";
import { makeExercise, makeRun, tempDir } from "./fixtures.js";

describe("TrackerStore", () => {
  let dir: string;
  let stateDir: string;
  let store: TrackerStore;

  beforeEach(async () => {
    dir = await tempDir();
    stateDir = join(dir, ".tracker");
    store = new TrackerStore(stateDir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads back exactly what it saved, whatever the metrics hold", async () => {
    const run = makeRun({
      config: { temperature: 0.2, tags: ["nightly"] },
      currentExercise: "python/b",
      exercises: [
        makeExercise({
          name: "a",
          language: "python",
          state: "passed",
          attempts: 2,
          durations: [1200, 800.5],
          metrics: { cost: 0.01, nested: { list: [1, "x", null, true], empty: {} } },
          startedAt: "2025-01-01T00:00:01.000Z",
          completedAt: "2025-01-01T00:00:03.000Z",
        }),
        makeExercise({
          name: "b",
          language: "python",
          state: "running",
          attempts: 1,
          startedAt: "2025-01-01T00:00:04.000Z",
        }),
      ],
    });

    await store.save(run);
    const loaded = await store.load("r1");

    expect(loaded.status).toBe("loaded");
    if (loaded.status === "loaded") {
      expect(loaded.value).toEqual(run);
      expect(loaded.path).toBe(join(stateDir, "r1.json"));
    }
  });

  it("reports a missing state file as not found", async () => {
    const result = await store.load("r1");
    expect(result.status).toBe("not-found");
    if (result.status === "not-found") expect(result.error).toBeInstanceOf(NotFoundError);
  });

  it("reports corrupt JSON as unreadable", async () => {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, "r1.json"), '{"run_id": "r1", "sta');

    const result = await store.load("r1");
    expect(result.status).toBe("unreadable");
    if (result.status === "unreadable") {
      expect(result.error).toBeInstanceOf(PersistenceError);
      expect(result.error.retryable).toBe(true);
      expect(result.error.path).toBe(join(stateDir, "r1.json"));
    }
  });

  it("rejects unknown state names", async () => {
    const snapshot = { ...toSnapshot(makeRun()), state: "exploded" };
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, "r1.json"), JSON.stringify(snapshot));

    const result = await store.load("r1");
    expect(result.status).toBe("unreadable");
    if (result.status === "unreadable") expect(result.error.message).toMatch(/^Invalid state for run "r1" at state:/);
  });

  it("rejects a file that holds another run", async () => {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, "r2.json"), JSON.stringify(toSnapshot(makeRun({ runId: "r1" }))));

    const result = await store.load("r2");
    expect(result.status).toBe("unreadable");
    if (result.status === "unreadable") expect(result.error.message).toBe('State file for "r2" holds run "r1"');
  });

  it("lists state files only", async () => {
    await mkdir(stateDir, { recursive: true });
    await writeFile(join(stateDir, "r1.json"), "{}");
    await writeFile(join(stateDir, ".r2.json.123.abcd1234.tmp"), "{}");
    await writeFile(join(stateDir, "report_r1.json"), "{}");
    await writeFile(join(stateDir, "notes.txt"), "");

    expect(await store.listRunIds()).toEqual(["r1"]);
    expect(await store.listReportIds()).toEqual(["r1"]);
  });

  it("lists nothing for a missing directory", async () => {
    expect(await store.listRunIds()).toEqual([]);
    expect(await store.exists("r1")).toBe(false);
  });

  it("loads the most recently written run", async () => {
    await store.save(makeRun({ runId: "older" }));
    await store.save(makeRun({ runId: "newer" }));
    await utimes(join(stateDir, "older.json"), new Date("2025-01-02"), new Date("2025-01-02"));
    await utimes(join(stateDir, "newer.json"), new Date("2025-01-01"), new Date("2025-01-01"));

    const result = await store.loadLatest();
    expect(result.status).toBe("loaded");
    if (result.status === "loaded") expect(result.value.runId).toBe("older");
  });

  it("reports an empty directory as not found", async () => {
    const result = await store.loadLatest();
    expect(result.status).toBe("not-found");
  });

  it("leaves no temp files behind after saving", async () => {
    await store.save(makeRun());
    await store.save(makeRun({ state: "paused" }));
    expect(await readdir(stateDir)).toEqual(["r1.json"]);
    expect(await store.exists("r1")).toBe(true);
  });

  it("creates a state file only once", async () => {
    await store.save(makeRun({ model: "first" }), { create: true });
    await expect(store.save(makeRun({ model: "second" }), { create: true })).rejects.toThrow(
      /Run "r1" already exists/
    );

    expect(await readdir(stateDir)).toEqual(["r1.json"]);
    const loaded = await store.load("r1");
    expect(loaded.status === "loaded" ? loaded.value.model : null).toBe("first");
  });

  it("wraps write failures in PersistenceError", async () => {
    await writeFile(join(dir, "blocker"), "");
    const blocked = new TrackerStore(join(dir, "blocker", ".tracker"));

    await expect(blocked.save(makeRun())).rejects.toBeInstanceOf(PersistenceError);
  });

  it("refuses unsafe run ids", () => {
    expect(() => store.statePath("../outside")).toThrow(ConfigurationError);
    expect(() => store.statePath("report_r1")).toThrow(ConfigurationError);
    expect(store.statePath("2025-01-01_run.v2")).toBe(join(stateDir, "2025-01-01_run.v2.json"));
  });

  it("writes a report once and reads it back", async () => {
    const run = makeRun({
      exercises: [makeExercise({ name: "a", language: "python", state: "passed", attempts: 1 })],
    });
    const report = buildTrackerReport(
      run,
      progressOf(run),
      computeStatistics(run),
      new Date("2025-01-01T12:00:00.000Z")
    );

    const path = await store.exportReport(report);
    expect(path).toBe(join(stateDir, "report_r1.json"));
    await expect(store.exportReport(report)).rejects.toBeInstanceOf(ConfigurationError);

    const loaded = await store.loadReport("r1");
    expect(loaded.status).toBe("loaded");
    if (loaded.status === "loaded") expect(loaded.value).toEqual(report);
    expect(await readdir(stateDir)).toEqual(["report_r1.json"]);
  });
});
