import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Exercise, Run } from "../run/types.js";

export function tempDir(prefix = "bench-tracker-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export function makeExercise(overrides: Partial<Exercise> & Pick<Exercise, "name" | "language">): Exercise {
  return {
    state: "pending",
    attempts: 0,
    maxAttempts: 3,
    durations: [],
    metrics: {},
    startedAt: null,
    completedAt: null,
    errorMessage: null,
    ...overrides,
  };
}

export function makeRun(overrides: Partial<Omit<Run, "exercises">> & { exercises?: Exercise[] } = {}): Run {
  const { exercises = [], ...rest } = overrides;
  const map = new Map<string, Exercise>();
  for (const exercise of exercises) map.set(`${exercise.language}/${exercise.name}`, exercise);
  return {
    runId: "r1",
    model: "test-model",
    languages: ["python"],
    totalExercises: 2,
    state: "running",
    startedAt: "2025-01-01T00:00:00.000Z",
    completedAt: null,
    currentExercise: null,
    config: {},
    ...rest,
    exercises: map,
  };
}
