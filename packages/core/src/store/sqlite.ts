import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { EXERCISE_STATES, RUN_STATES } from "../run/types.js";
import { extractUsage } from "../stats/engine.js";
import type { TrackerReport } from "../report/json.js";
import type { ArchivedRun, ExerciseOutcome, HistoryEntry, RunHistory } from "./history.js";

const RunRowSchema = z.object({
  run_id: z.string(),
  model: z.string(),
  state: z.enum(RUN_STATES),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  total_exercises: z.number(),
  passed: z.number(),
  failed: z.number(),
  pass_rate: z.number(),
  total_cost: z.number(),
  archived_at: z.string(),
});

const ExerciseRowSchema = z.object({
  key: z.string(),
  language: z.string(),
  name: z.string(),
  state: z.enum(EXERCISE_STATES),
  attempts: z.number(),
  duration_ms: z.number(),
  cost: z.number(),
});

function toEntry(row: z.output<typeof RunRowSchema>): HistoryEntry {
  return {
    runId: row.run_id,
    model: row.model,
    state: row.state,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    totalExercises: row.total_exercises,
    passed: row.passed,
    failed: row.failed,
    passRate: row.pass_rate,
    totalCost: row.total_cost,
    archivedAt: row.archived_at,
  };
}

export class SqliteRunHistory implements RunHistory {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id          TEXT PRIMARY KEY,
        model           TEXT NOT NULL,
        state           TEXT NOT NULL,
        started_at      TEXT,
        completed_at    TEXT,
        total_exercises INTEGER NOT NULL,
        passed          INTEGER NOT NULL,
        failed          INTEGER NOT NULL,
        pass_rate       REAL NOT NULL,
        total_cost      REAL NOT NULL,
        archived_at     TEXT NOT NULL,
        report          TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS exercises (
        run_id      TEXT NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
        key         TEXT NOT NULL,
        language    TEXT NOT NULL,
        name        TEXT NOT NULL,
        state       TEXT NOT NULL,
        attempts    INTEGER NOT NULL,
        duration_ms REAL NOT NULL,
        cost        REAL NOT NULL,
        PRIMARY KEY (run_id, key)
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(started_at);
    `);
  }

  recordReport(report: TrackerReport): boolean {
    const { run, statistics } = report;

    const insertRun = this.db.prepare(`
      INSERT OR IGNORE INTO runs
        (run_id, model, state, started_at, completed_at, total_exercises, passed, failed, pass_rate, total_cost, archived_at, report)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertExercise = this.db.prepare(`
      INSERT INTO exercises (run_id, key, language, name, state, attempts, duration_ms, cost)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const transaction = this.db.transaction((): boolean => {
      const inserted = insertRun.run(
        run.run_id,
        run.model,
        run.state,
        run.started_at,
        run.completed_at,
        run.total_exercises,
        statistics.passed,
        statistics.failed + statistics.errored,
        statistics.passRate,
        statistics.totalCost,
        new Date().toISOString(),
        JSON.stringify(report)
      );
      if (inserted.changes === 0) return false;

      for (const [key, exercise] of Object.entries(run.exercises)) {
        const slash = key.indexOf("/");
        insertExercise.run(
          run.run_id,
          key,
          key.slice(0, slash),
          key.slice(slash + 1),
          exercise.state,
          exercise.attempts,
          exercise.durations.reduce((sum, d) => sum + d, 0),
          extractUsage(exercise.metrics).cost
        );
      }
      return true;
    });
    return transaction();
  }

  loadRun(runId: string): ArchivedRun | null {
    const row = this.db.prepare("SELECT * FROM runs WHERE run_id = ?").get(runId);
    if (row === undefined) return null;

    const exercises: ExerciseOutcome[] = this.db
      .prepare("SELECT * FROM exercises WHERE run_id = ? ORDER BY key")
      .all(runId)
      .map((raw) => {
        const exercise = ExerciseRowSchema.parse(raw);
        return {
          key: exercise.key,
          language: exercise.language,
          name: exercise.name,
          state: exercise.state,
          attempts: exercise.attempts,
          durationMs: exercise.duration_ms,
          cost: exercise.cost,
        };
      });

    return { entry: toEntry(RunRowSchema.parse(row)), exercises };
  }

  listRuns(limit = 50): HistoryEntry[] {
    return this.db
      .prepare("SELECT * FROM runs ORDER BY started_at DESC, run_id DESC LIMIT ?")
      .all(limit)
      .map((row) => toEntry(RunRowSchema.parse(row)));
  }

  close(): void {
    this.db.close();
  }
}
