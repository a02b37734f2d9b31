import type { ExerciseState } from "../run/types.js";
import type { ExerciseOutcome } from "../store/history.js";

export type DiffStatus = "regression" | "improvement" | "stable" | "added" | "removed";

export interface ExerciseDiff {
  exercise: string;
  status: DiffStatus;
  before?: { state: ExerciseState; attempts: number };
  after?: { state: ExerciseState; attempts: number };
  attemptsDelta?: number;
}

export interface DiffSummary {
  total: number;
  regressions: number;
  improvements: number;
  stable: number;
  added: number;
  removed: number;
}

export interface DiffReport {
  beforeRun: string;
  afterRun: string;
  exercises: ExerciseDiff[];
  summary: DiffSummary;
  hasRegressions: boolean;
}

export function diffRuns(
  beforeRun: string,
  beforeExercises: ExerciseOutcome[],
  afterRun: string,
  afterExercises: ExerciseOutcome[]
): DiffReport {
  const beforeMap = new Map<string, ExerciseOutcome>();
  for (const e of beforeExercises) beforeMap.set(e.key, e);

  const afterMap = new Map<string, ExerciseOutcome>();
  for (const e of afterExercises) afterMap.set(e.key, e);

  const allKeys = [...new Set([...beforeMap.keys(), ...afterMap.keys()])].sort();
  const exercises: ExerciseDiff[] = [];

  for (const key of allKeys) {
    const before = beforeMap.get(key);
    const after = afterMap.get(key);

    if (before && after) {
      const wasPassing = before.state === "passed";
      const isPassing = after.state === "passed";

      let status: DiffStatus;
      if (wasPassing && !isPassing) {
        status = "regression";
      } else if (!wasPassing && isPassing) {
        status = "improvement";
      } else {
        status = "stable";
      }

      exercises.push({
        exercise: key,
        status,
        before: { state: before.state, attempts: before.attempts },
        after: { state: after.state, attempts: after.attempts },
        attemptsDelta: after.attempts - before.attempts,
      });
    } else if (after) {
      exercises.push({
        exercise: key,
        status: "added",
        after: { state: after.state, attempts: after.attempts },
      });
    } else if (before) {
      exercises.push({
        exercise: key,
        status: "removed",
        before: { state: before.state, attempts: before.attempts },
      });
    }
  }

  const statusOrder: Record<DiffStatus, number> = {
    regression: 0,
    improvement: 1,
    stable: 2,
    added: 3,
    removed: 4,
  };
  exercises.sort((a, b) => statusOrder[a.status] - statusOrder[b.status]);

  const summary: DiffSummary = {
    total: exercises.length,
    regressions: exercises.filter((e) => e.status === "regression").length,
    improvements: exercises.filter((e) => e.status === "improvement").length,
    stable: exercises.filter((e) => e.status === "stable").length,
    added: exercises.filter((e) => e.status === "added").length,
    removed: exercises.filter((e) => e.status === "removed").length,
  };

  return {
    beforeRun,
    afterRun,
    exercises,
    summary,
    hasRegressions: summary.regressions > 0,
  };
}
