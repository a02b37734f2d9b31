import { describe, expect, it } from "vitest";
import {
  StatisticsAccumulator,
  computeProgress,
  computeStatistics,
  extractUsage,
  progressOf,
} from "../stats/engine.js";
import { makeExercise, makeRun } from "./fixtures.js";

function sampleRun() {
  return makeRun({
    languages: ["python", "go"],
    totalExercises: 5,
    exercises: [
      makeExercise({
        name: "a",
        language: "python",
        state: "passed",
        durations: [1000, 500],
        metrics: { cost: 0.1, tokens: 100, num_timeouts: 1 },
      }),
      makeExercise({
        name: "b",
        language: "python",
        state: "failed",
        durations: [500],
        metrics: { cost: 0.2, tokens_sent: 40, tokens_received: 10, num_timeouts: 2 },
      }),
      makeExercise({ name: "c", language: "go", state: "running" }),
      makeExercise({ name: "d", language: "go", state: "error", durations: [2000], metrics: { cost: 0.05 } }),
    ],
  });
}

describe("extractUsage", () => {
  it("prefers total_tokens, then tokens, then sent plus received", () => {
    expect(extractUsage({ total_tokens: 20, tokens: 30, tokens_sent: 1 }).totalTokens).toBe(20);
    expect(extractUsage({ tokens: 30, tokens_sent: 1 }).totalTokens).toBe(30);
    expect(extractUsage({ tokens_sent: 10, tokens_received: 5 }).totalTokens).toBe(15);
  });

  it("ignores non-numeric values", () => {
    expect(extractUsage({ cost: "free", num_errors: "many", num_timeouts: 2, label: "x" })).toEqual({
      cost: 0,
      tokensSent: 0,
      tokensReceived: 0,
      totalTokens: 0,
      errorCounters: { num_timeouts: 2 },
    });
  });
});

describe("computeStatistics", () => {
  it("aggregates counts, usage, languages and timing", () => {
    expect(computeStatistics(sampleRun())).toEqual({
      runId: "r1",
      totalExercises: 5,
      completed: 3,
      passed: 1,
      failed: 1,
      skipped: 0,
      errored: 1,
      passRate: 20,
      successRate: 33.33,
      totalCost: 0.35,
      totalTokens: 150,
      tokensSent: 40,
      tokensReceived: 10,
      avgCostPerExercise: 0.1167,
      avgTokensPerExercise: 50,
      errorCounters: { num_timeouts: 3 },
      byLanguage: {
        python: { total: 2, completed: 2, passed: 1, failed: 1, skipped: 0, errored: 0, passRate: 50 },
        go: { total: 2, completed: 1, passed: 0, failed: 0, skipped: 0, errored: 1, passRate: 0 },
      },
      averageDurationMs: 1333.33,
      estimatedRemainingMs: 2666.66,
    });
  });

  it("reports zeroes and no estimate for an empty run", () => {
    const stats = computeStatistics(makeRun({ totalExercises: 0 }));
    expect(stats.passRate).toBe(0);
    expect(stats.successRate).toBe(0);
    expect(stats.avgCostPerExercise).toBe(0);
    expect(stats.averageDurationMs).toBeNull();
    expect(stats.estimatedRemainingMs).toBeNull();
  });

  it("matches the incremental accumulator", () => {
    const run = sampleRun();
    const accumulator = new StatisticsAccumulator();
    const exercises = [...run.exercises.values()];

    for (const exercise of exercises) accumulator.track(exercise);
    for (const exercise of exercises.reverse()) accumulator.record(exercise);

    expect(accumulator.snapshot(run)).toEqual(computeStatistics(run));
    expect(accumulator.completed).toBe(3);
  });
});

describe("progress", () => {
  it("rounds the percentage to two decimals", () => {
    expect(computeProgress(1, 3)).toEqual({ completed: 1, total: 3, percentage: 33.33 });
    expect(computeProgress(0, 0)).toEqual({ completed: 0, total: 0, percentage: 0 });
  });

  it("counts terminal exercises of a run", () => {
    expect(progressOf(sampleRun())).toEqual({ completed: 3, total: 5, percentage: 60 });
  });
});
