import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "@bench-tracker/core";
import { interpolateEnvVars, loadConfig, parseConfig } from "../config.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig({})).toEqual({
      root: "tmp.benchmarks",
      monitor: { refreshInterval: 5, autoDetect: true },
      history: { path: join("tmp.benchmarks", ".history.db") },
      verbose: false,
    });
  });

  it("places the history database under a custom root", () => {
    expect(parseConfig({ root: "runs" }).history.path).toBe(join("runs", ".history.db"));
    expect(parseConfig({ root: "runs", history: { path: "/data/history.db" } }).history.path).toBe(
      "/data/history.db"
    );
  });

  it("rejects invalid values and unknown keys", () => {
    expect(() => parseConfig({ monitor: { refreshInterval: 0 } })).toThrow(ConfigurationError);
    expect(() => parseConfig({ monitor: { autoDetect: "yes" } })).toThrow(/monitor\.autoDetect/);
    expect(() => parseConfig({ rooot: "typo" })).toThrow(ConfigurationError);
  });
});

describe("interpolateEnvVars", () => {
  afterEach(() => {
    delete process.env.BENCH_TRACKER_TEST_ROOT;
  });

  it("replaces env references in nested strings", () => {
    process.env.BENCH_TRACKER_TEST_ROOT = "/srv/runs";
    expect(
      interpolateEnvVars({ root: "${env.BENCH_TRACKER_TEST_ROOT}/nightly", list: ["${env.UNSET_FOR_TEST}"], n: 3 })
    ).toEqual({ root: "/srv/runs/nightly", list: [""], n: 3 });
  });
});

describe("loadConfig", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("reads an rc file from the search directory", async () => {
    dir = await mkdtemp(join(tmpdir(), "bench-tracker-config-"));
    await writeFile(
      join(dir, ".bench-trackerrc.json"),
      JSON.stringify({ root: "nightly", monitor: { refreshInterval: 2 }, verbose: true })
    );

    expect(await loadConfig(dir)).toEqual({
      root: "nightly",
      monitor: { refreshInterval: 2, autoDetect: true },
      history: { path: join("nightly", ".history.db") },
      verbose: true,
    });
  });

  it("falls back to defaults when no file exists", async () => {
    dir = await mkdtemp(join(tmpdir(), "bench-tracker-config-"));
    expect((await loadConfig(dir)).root).toBe("tmp.benchmarks");
  });
});
