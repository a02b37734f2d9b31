import { isTerminalExerciseState } from "../run/types.js";
import type { Exercise, MetricMap, Progress, Run, TerminalExerciseState } from "../run/types.js";

export interface LanguageStatistics {
  total: number;
  completed: number;
  passed: number;
  failed: number;
  skipped: number;
  errored: number;
  passRate: number;
}

export interface StatisticsSnapshot {
  runId: string;
  totalExercises: number;
  completed: number;
  passed: number;
  failed: number;
  skipped: number;
  errored: number;
  /** Passed as a percentage of every exercise in the run. */
  passRate: number;
  /** Passed as a percentage of the exercises finished so far. */
  successRate: number;
  totalCost: number;
  totalTokens: number;
  tokensSent: number;
  tokensReceived: number;
  avgCostPerExercise: number;
  avgTokensPerExercise: number;
  errorCounters: Record<string, number>;
  byLanguage: Record<string, LanguageStatistics>;
  averageDurationMs: number | null;
  estimatedRemainingMs: number | null;
}

export interface ExerciseUsage {
  cost: number;
  tokensSent: number;
  tokensReceived: number;
  totalTokens: number;
  errorCounters: Record<string, number>;
}

const ERROR_COUNTER_PREFIX = "num_";

function numericMetric(metrics: MetricMap, key: string): number | undefined {
  const value = metrics[key];
  return typeof value === "number" ? value : undefined;
}

/**
 * Reads the well-known keys out of an opaque metric map. Anything else in the
 * map is ignored here but still persisted.
 */
export function extractUsage(metrics: MetricMap): ExerciseUsage {
  const tokensSent = numericMetric(metrics, "tokens_sent") ?? 0;
  const tokensReceived = numericMetric(metrics, "tokens_received") ?? 0;
  const totalTokens =
    numericMetric(metrics, "total_tokens") ??
    numericMetric(metrics, "tokens") ??
    tokensSent + tokensReceived;

  const errorCounters: Record<string, number> = {};
  for (const [key, value] of Object.entries(metrics)) {
    if (key.startsWith(ERROR_COUNTER_PREFIX) && typeof value === "number") {
      errorCounters[key] = value;
    }
  }

  return {
    cost: numericMetric(metrics, "cost") ?? 0,
    tokensSent,
    tokensReceived,
    totalTokens,
    errorCounters,
  };
}

export function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function percentage(part: number, whole: number): number {
  return whole > 0 ? round((part / whole) * 100, 2) : 0;
}

function emptyLanguage(): Omit<LanguageStatistics, "passRate"> {
  return { total: 0, completed: 0, passed: 0, failed: 0, skipped: 0, errored: 0 };
}

const STATE_FIELD: Record<TerminalExerciseState, "passed" | "failed" | "skipped" | "errored"> = {
  passed: "passed",
  failed: "failed",
  skipped: "skipped",
  error: "errored",
};

/**
 * Running totals for one run. `track` is called once per new exercise and
 * `record` once per exercise reaching a terminal state, so each update is
 * constant time and `snapshot` never walks the exercise map.
 */
export class StatisticsAccumulator {
  private counts = { passed: 0, failed: 0, skipped: 0, errored: 0 };
  private languages = new Map<string, Omit<LanguageStatistics, "passRate">>();
  private cost = 0;
  private tokensSent = 0;
  private tokensReceived = 0;
  private totalTokens = 0;
  private errorCounters = new Map<string, number>();
  private durationSum = 0;
  private durationCount = 0;

  get completed(): number {
    return this.counts.passed + this.counts.failed + this.counts.skipped + this.counts.errored;
  }

  track(exercise: Pick<Exercise, "language">): void {
    this.language(exercise.language).total += 1;
  }

  record(exercise: Exercise): void {
    if (!isTerminalExerciseState(exercise.state)) return;

    const field = STATE_FIELD[exercise.state];
    this.counts[field] += 1;
    const language = this.language(exercise.language);
    language.completed += 1;
    language[field] += 1;

    const usage = extractUsage(exercise.metrics);
    this.cost += usage.cost;
    this.tokensSent += usage.tokensSent;
    this.tokensReceived += usage.tokensReceived;
    this.totalTokens += usage.totalTokens;
    for (const [key, value] of Object.entries(usage.errorCounters)) {
      this.errorCounters.set(key, (this.errorCounters.get(key) ?? 0) + value);
    }

    if (exercise.durations.length > 0) {
      this.durationSum += exercise.durations.reduce((sum, d) => sum + d, 0);
      this.durationCount += 1;
    }
  }

  snapshot(run: Pick<Run, "runId" | "totalExercises">): StatisticsSnapshot {
    const completed = this.completed;
    const divisor = Math.max(completed, 1);

    const byLanguage: Record<string, LanguageStatistics> = {};
    for (const [name, stats] of this.languages) {
      byLanguage[name] = { ...stats, passRate: percentage(stats.passed, stats.total) };
    }

    const averageDurationMs =
      this.durationCount > 0 ? round(this.durationSum / this.durationCount, 2) : null;
    const remaining = Math.max(run.totalExercises - completed, 0);

    return {
      runId: run.runId,
      totalExercises: run.totalExercises,
      completed,
      ...this.counts,
      passRate: percentage(this.counts.passed, run.totalExercises),
      successRate: percentage(this.counts.passed, completed),
      totalCost: round(this.cost, 4),
      totalTokens: this.totalTokens,
      tokensSent: this.tokensSent,
      tokensReceived: this.tokensReceived,
      avgCostPerExercise: round(this.cost / divisor, 4),
      avgTokensPerExercise: round(this.totalTokens / divisor, 2),
      errorCounters: Object.fromEntries(this.errorCounters),
      byLanguage,
      averageDurationMs,
      estimatedRemainingMs:
        averageDurationMs !== null && completed > 0 ? round(averageDurationMs * remaining, 2) : null,
    };
  }

  private language(name: string): Omit<LanguageStatistics, "passRate"> {
    let stats = this.languages.get(name);
    if (!stats) {
      stats = emptyLanguage();
      this.languages.set(name, stats);
    }
    return stats;
  }
}

export function accumulate(run: Run): StatisticsAccumulator {
  const accumulator = new StatisticsAccumulator();
  for (const exercise of run.exercises.values()) {
    accumulator.track(exercise);
    accumulator.record(exercise);
  }
  return accumulator;
}

/** Full recompute from the run alone; used by readers that only have a snapshot. */
export function computeStatistics(run: Run): StatisticsSnapshot {
  return accumulate(run).snapshot(run);
}

export function computeProgress(completed: number, total: number): Progress {
  return { completed, total, percentage: percentage(completed, total) };
}

export function progressOf(run: Run): Progress {
  let completed = 0;
  for (const exercise of run.exercises.values()) {
    if (isTerminalExerciseState(exercise.state)) completed += 1;
  }
  return computeProgress(completed, run.totalExercises);
}
