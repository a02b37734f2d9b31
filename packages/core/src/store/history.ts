import type { ExerciseState, RunState } from "../run/types.js";
import type { TrackerReport } from "../report/json.js";

export interface HistoryEntry {
  runId: string;
  model: string;
  state: RunState;
  startedAt: string | null;
  completedAt: string | null;
  totalExercises: number;
  passed: number;
  failed: number;
  passRate: number;
  totalCost: number;
  archivedAt: string;
}

export interface ExerciseOutcome {
  key: string;
  language: string;
  name: string;
  state: ExerciseState;
  attempts: number;
  durationMs: number;
  cost: number;
}

export interface ArchivedRun {
  entry: HistoryEntry;
  exercises: ExerciseOutcome[];
}

/** Index of exported reports, for listing and comparing finished runs. */
export interface RunHistory {
  /** Returns false when the run was already archived. */
  recordReport(report: TrackerReport): boolean;
  loadRun(runId: string): ArchivedRun | null;
  listRuns(limit?: number): HistoryEntry[];
  close(): void;
}
