export const RUN_STATES = [
  "initializing",
  "running",
  "paused",
  "completed",
  "failed",
  "cancelled",
] as const;

export type RunState = (typeof RUN_STATES)[number];

export const EXERCISE_STATES = [
  "pending",
  "running",
  "passed",
  "failed",
  "skipped",
  "error",
] as const;

export type ExerciseState = (typeof EXERCISE_STATES)[number];

export type TerminalRunState = Extract<RunState, "completed" | "failed" | "cancelled">;
export type TerminalExerciseState = Extract<ExerciseState, "passed" | "failed" | "skipped" | "error">;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Opaque per-exercise metrics supplied by the model wrapper (cost, token counts, error counters). */
export type MetricMap = Record<string, JsonValue>;

export interface Exercise {
  name: string;
  language: string;
  state: ExerciseState;
  attempts: number;
  maxAttempts: number;
  // Wall time of each attempt, in milliseconds
  durations: number[];
  metrics: MetricMap;
  startedAt: string | null;
  completedAt: string | null;
  errorMessage: string | null;
}

export interface Run {
  runId: string;
  model: string;
  languages: string[];
  totalExercises: number;
  state: RunState;
  startedAt: string | null;
  completedAt: string | null;
  currentExercise: string | null;
  config: MetricMap;
  exercises: Map<string, Exercise>;
}

export interface Progress {
  readonly completed: number;
  readonly total: number;
  readonly percentage: number;
}

export function exerciseKey(language: string, name: string): string {
  return `${language}/${name}`;
}

/** Splits at the first "/": language names never contain one, exercise names may. */
export function parseExerciseKey(key: string): { language: string; name: string } | null {
  const slash = key.indexOf("/");
  if (slash <= 0 || slash === key.length - 1) return null;
  return { language: key.slice(0, slash), name: key.slice(slash + 1) };
}

export function isTerminalRunState(state: RunState): state is TerminalRunState {
  return state === "completed" || state === "failed" || state === "cancelled";
}

export function isTerminalExerciseState(state: ExerciseState): state is TerminalExerciseState {
  return state === "passed" || state === "failed" || state === "skipped" || state === "error";
}

export function cloneExercise(exercise: Exercise): Exercise {
  return {
    ...exercise,
    durations: [...exercise.durations],
    metrics: structuredClone(exercise.metrics),
  };
}

export function cloneRun(run: Run): Run {
  const exercises = new Map<string, Exercise>();
  for (const [key, exercise] of run.exercises) exercises.set(key, cloneExercise(exercise));
  return {
    ...run,
    languages: [...run.languages],
    config: structuredClone(run.config),
    exercises,
  };
}
