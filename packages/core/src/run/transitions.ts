import { ConfigurationError } from "../errors.js";
import type { ExerciseState, RunState } from "./types.js";

const RUN_TRANSITIONS: Record<RunState, readonly RunState[]> = {
  initializing: ["running", "failed", "cancelled"],
  running: ["paused", "completed", "failed", "cancelled"],
  paused: ["running", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

// "running" -> "running" is a retry of the same exercise
const EXERCISE_TRANSITIONS: Record<ExerciseState, readonly ExerciseState[]> = {
  pending: ["running", "skipped"],
  running: ["running", "passed", "failed", "skipped", "error"],
  passed: [],
  failed: [],
  skipped: [],
  error: [],
};

export function canTransitionRun(from: RunState, to: RunState): boolean {
  return RUN_TRANSITIONS[from].includes(to);
}

export function assertRunTransition(runId: string, from: RunState, to: RunState): void {
  if (!canTransitionRun(from, to)) {
    throw new ConfigurationError(`Run "${runId}" cannot move from ${from} to ${to}`);
  }
}

export function canTransitionExercise(from: ExerciseState, to: ExerciseState): boolean {
  return EXERCISE_TRANSITIONS[from].includes(to);
}

export function assertExerciseTransition(key: string, from: ExerciseState, to: ExerciseState): void {
  if (!canTransitionExercise(from, to)) {
    throw new ConfigurationError(`Exercise "${key}" cannot move from ${from} to ${to}`);
  }
}
