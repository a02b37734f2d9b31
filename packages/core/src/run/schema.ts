import { z } from "zod";
import { EXERCISE_STATES, RUN_STATES, parseExerciseKey } from "./types.js";
import type { Exercise, JsonValue, MetricMap, Run } from "./types.js";

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const MetricMapSchema = z.record(z.string(), JsonValueSchema);

const TimestampSchema = z.string().datetime({ offset: true }).nullable();

export const ExerciseSnapshotSchema = z.object({
  state: z.enum(EXERCISE_STATES),
  attempts: z.number().int().nonnegative(),
  max_attempts: z.number().int().positive(),
  durations: z.array(z.number().nonnegative()),
  metrics: MetricMapSchema,
  started_at: TimestampSchema,
  completed_at: TimestampSchema,
  error_message: z.string().nullable().default(null),
});

export const RunSnapshotSchema = z
  .object({
    run_id: z.string().min(1),
    model: z.string(),
    languages: z.array(z.string()),
    total_exercises: z.number().int().nonnegative(),
    state: z.enum(RUN_STATES),
    started_at: TimestampSchema,
    completed_at: TimestampSchema,
    current_exercise: z.string().nullable().default(null),
    config: MetricMapSchema.default({}),
    exercises: z.record(z.string(), ExerciseSnapshotSchema),
  })
  .superRefine((snapshot, ctx) => {
    for (const key of Object.keys(snapshot.exercises)) {
      if (!parseExerciseKey(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["exercises", key],
          message: `Exercise key must be "<language>/<name>", got "${key}"`,
        });
      }
    }
  });

export type ExerciseSnapshot = z.output<typeof ExerciseSnapshotSchema>;
export type RunSnapshot = z.output<typeof RunSnapshotSchema>;

export function toSnapshot(run: Run): RunSnapshot {
  const exercises: Record<string, ExerciseSnapshot> = {};
  for (const [key, exercise] of run.exercises) {
    exercises[key] = {
      state: exercise.state,
      attempts: exercise.attempts,
      max_attempts: exercise.maxAttempts,
      durations: [...exercise.durations],
      metrics: exercise.metrics,
      started_at: exercise.startedAt,
      completed_at: exercise.completedAt,
      error_message: exercise.errorMessage,
    };
  }

  return {
    run_id: run.runId,
    model: run.model,
    languages: [...run.languages],
    total_exercises: run.totalExercises,
    state: run.state,
    started_at: run.startedAt,
    completed_at: run.completedAt,
    current_exercise: run.currentExercise,
    config: run.config,
    exercises,
  };
}

export function fromSnapshot(snapshot: RunSnapshot): Run {
  const exercises = new Map<string, Exercise>();
  for (const [key, data] of Object.entries(snapshot.exercises)) {
    const identity = parseExerciseKey(key);
    // Rejected by the schema refinement; kept for callers that skip parsing
    if (!identity) continue;
    exercises.set(key, {
      name: identity.name,
      language: identity.language,
      state: data.state,
      attempts: data.attempts,
      maxAttempts: data.max_attempts,
      durations: [...data.durations],
      metrics: data.metrics,
      startedAt: data.started_at,
      completedAt: data.completed_at,
      errorMessage: data.error_message,
    });
  }

  return {
    runId: snapshot.run_id,
    model: snapshot.model,
    languages: [...snapshot.languages],
    totalExercises: snapshot.total_exercises,
    state: snapshot.state,
    startedAt: snapshot.started_at,
    completedAt: snapshot.completed_at,
    currentExercise: snapshot.current_exercise,
    config: snapshot.config,
    exercises,
  };
}

/** Validates caller-supplied metrics; top-level `undefined` entries are dropped the way JSON would drop them. */
export function parseMetrics(
  value: Record<string, unknown>
): { success: true; data: MetricMap } | { success: false; error: z.ZodError } {
  // Keys are copied with Object.fromEntries, which keeps an own "__proto__" key
  const entries: [string, JsonValue][] = [];
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) continue;
    const parsed = JsonValueSchema.safeParse(entry, { path: [key] });
    if (!parsed.success) return { success: false, error: parsed.error };
    entries.push([key, parsed.data]);
  }
  return { success: true, data: Object.fromEntries(entries) };
}
