import { ConfigurationError } from "./errors.js";
import { silentLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { parseMetrics } from "./run/schema.js";
import { assertExerciseTransition, assertRunTransition } from "./run/transitions.js";
import { cloneRun, exerciseKey, isTerminalRunState } from "./run/types.js";
import type { Exercise, MetricMap, Progress, Run, RunState, TerminalRunState } from "./run/types.js";
import { accumulate, computeProgress, StatisticsAccumulator } from "./stats/engine.js";
import type { StatisticsSnapshot } from "./stats/engine.js";
import { buildTrackerReport } from "./report/json.js";
import { assertValidRunId } from "./store/tracker-store.js";
import type { TrackerStore } from "./store/tracker-store.js";
import { Mutex } from "./utils/mutex.js";

export const DEFAULT_MAX_ATTEMPTS = 3;

export interface TrackerOptions {
  store: TrackerStore;
  logger?: Logger;
  /** Milliseconds since the epoch; tests pin it. */
  clock?: () => number;
}

export interface StartRunOptions {
  runId: string;
  model: string;
  languages: string[];
  totalExercises: number;
  config?: Record<string, unknown>;
}

/**
 * The authoritative state of one benchmark run. Construct one per run and hand
 * the same instance to every worker; every mutation goes through a single
 * mutex and ends with an atomic snapshot write.
 */
export class BenchmarkTracker {
  private store: TrackerStore;
  private logger: Logger;
  private clock: () => number;
  private mutex = new Mutex();
  private run: Run | null = null;
  private stats = new StatisticsAccumulator();
  // Start time of each exercise's open attempt
  private attemptStarts = new Map<string, number>();

  constructor(options: TrackerOptions) {
    this.store = options.store;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Rebuilds a tracker from the persisted snapshot of `runId`, e.g. after the
   * driver process restarted. Aggregates are recomputed from the exercises.
   */
  static async resume(options: TrackerOptions, runId: string): Promise<BenchmarkTracker> {
    const result = await options.store.load(runId);
    if (result.status !== "loaded") throw result.error;

    const tracker = new BenchmarkTracker(options);
    tracker.run = result.value;
    tracker.stats = accumulate(result.value);
    for (const [key, exercise] of result.value.exercises) {
      if (exercise.state === "running" && exercise.startedAt) {
        tracker.attemptStarts.set(key, Date.parse(exercise.startedAt));
      }
    }
    tracker.logger.info(`Resumed run ${runId} (${tracker.stats.completed}/${result.value.totalExercises} done)`);
    return tracker;
  }

  get runId(): string | null {
    return this.run?.runId ?? null;
  }

  async startRun(options: StartRunOptions): Promise<Run> {
    return this.mutex.runExclusive(async () => {
      if (this.run) {
        throw new ConfigurationError(`This tracker already holds run "${this.run.runId}"`);
      }
      assertValidRunId(options.runId);
      if (!Number.isInteger(options.totalExercises) || options.totalExercises < 0) {
        throw new ConfigurationError(`totalExercises must be a non-negative integer, got ${options.totalExercises}`);
      }
      if (options.languages.length === 0) {
        throw new ConfigurationError("A run needs at least one language");
      }
      const config = this.validMetrics(options.config ?? {}, "run config");
      // Fast path; the exclusive first write below settles a race with another tracker
      if (await this.store.exists(options.runId)) {
        throw new ConfigurationError(`Run "${options.runId}" already exists in ${this.store.stateDir}`);
      }

      const run: Run = {
        runId: options.runId,
        model: options.model,
        languages: [...options.languages],
        totalExercises: options.totalExercises,
        state: "initializing",
        startedAt: this.timestamp(),
        completedAt: null,
        currentExercise: null,
        config,
        exercises: new Map(),
      };
      assertRunTransition(run.runId, run.state, "running");
      run.state = "running";

      await this.store.save(run, { create: true });
      this.run = run;
      this.logger.info(`Started run ${run.runId} (${run.model}, ${run.totalExercises} exercises)`);
      return cloneRun(run);
    });
  }

  async startExercise(name: string, language: string, maxAttempts = DEFAULT_MAX_ATTEMPTS): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const run = this.requireState("running");
      if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new ConfigurationError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
      }

      const key = exerciseKey(language, name);
      const now = this.clock();

      const started = await this.commit(run, () => {
        let exercise = run.exercises.get(key);
        if (!exercise) {
          this.assertRoomFor(run, key);
          exercise = this.newExercise(name, language, maxAttempts);
          run.exercises.set(key, exercise);
          this.stats.track(exercise);
        } else if (exercise.state === "running") {
          if (exercise.attempts >= exercise.maxAttempts) {
            throw new ConfigurationError(
              `Exercise "${key}" has used all ${exercise.maxAttempts} attempts`
            );
          }
          this.closeAttempt(key, exercise, now);
        }

        assertExerciseTransition(key, exercise.state, "running");
        exercise.state = "running";
        exercise.attempts += 1;
        exercise.startedAt = new Date(now).toISOString();
        this.attemptStarts.set(key, now);
        run.currentExercise = key;
        return exercise;
      });
      this.logger.debug(`Started ${key} (attempt ${started.attempts}/${started.maxAttempts})`);
    });
  }

  async completeExercise(
    name: string,
    language: string,
    passed: boolean,
    metrics?: Record<string, unknown>,
    errorMessage?: string
  ): Promise<void> {
    await this.finishExercise(name, language, passed ? "passed" : "failed", metrics, errorMessage);
  }

  /** The attempt crashed rather than producing a pass/fail verdict. */
  async errorExercise(
    name: string,
    language: string,
    errorMessage: string,
    metrics?: Record<string, unknown>
  ): Promise<void> {
    await this.finishExercise(name, language, "error", metrics, errorMessage);
  }

  async skipExercise(name: string, language: string, reason?: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const run = this.requireState("running");
      const key = exerciseKey(language, name);
      const now = this.clock();

      await this.commit(run, () => {
        let exercise = run.exercises.get(key);
        if (!exercise) {
          this.assertRoomFor(run, key);
          exercise = this.newExercise(name, language, DEFAULT_MAX_ATTEMPTS);
          run.exercises.set(key, exercise);
          this.stats.track(exercise);
        }

        assertExerciseTransition(key, exercise.state, "skipped");
        if (exercise.state === "running") this.closeAttempt(key, exercise, now);
        this.settle(run, key, exercise, "skipped", now, {}, reason);
      });
      this.logger.debug(`Skipped ${key}${reason ? `: ${reason}` : ""}`);
    });
  }

  async pauseRun(): Promise<void> {
    await this.transitionRun("paused");
  }

  async resumeRun(): Promise<void> {
    await this.transitionRun("running");
  }

  async finishRun(state: TerminalRunState): Promise<void> {
    await this.transitionRun(state);
  }

  /** Rewrites the current snapshot, e.g. after the state file was removed. */
  async flush(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      await this.store.save(this.requireRun());
    });
  }

  /** Reads cached counters only; never waits for an in-flight mutation. */
  getProgress(): Progress {
    const run = this.requireRun();
    return computeProgress(this.stats.completed, run.totalExercises);
  }

  getStatistics(): StatisticsSnapshot {
    return this.stats.snapshot(this.requireRun());
  }

  getRun(): Run {
    return cloneRun(this.requireRun());
  }

  /** Writes the immutable `report_<run_id>.json` and returns its path. */
  async exportReport(): Promise<string> {
    return this.mutex.runExclusive(async () => {
      const run = this.requireRun();
      const report = buildTrackerReport(
        run,
        computeProgress(this.stats.completed, run.totalExercises),
        this.stats.snapshot(run),
        new Date(this.clock())
      );
      return this.store.exportReport(report);
    });
  }

  private async finishExercise(
    name: string,
    language: string,
    state: "passed" | "failed" | "error",
    metrics: Record<string, unknown> | undefined,
    errorMessage: string | undefined
  ): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const run = this.requireState("running");
      const key = exerciseKey(language, name);
      const exercise = run.exercises.get(key);

      if (!exercise || exercise.state !== "running") {
        throw new ConfigurationError(
          exercise
            ? `Exercise "${key}" is ${exercise.state}, not running; call startExercise first`
            : `Exercise "${key}" was never started in run "${run.runId}"`
        );
      }
      const validated = this.validMetrics(metrics ?? {}, `metrics for "${key}"`);

      const now = this.clock();
      await this.commit(run, () => {
        this.closeAttempt(key, exercise, now);
        this.settle(run, key, exercise, state, now, validated, errorMessage);
      });
      this.logger.info(`${key}: ${state.toUpperCase()} (${this.stats.completed}/${run.totalExercises})`);
    });
  }

  /**
   * Applies `change` to the held run and writes the snapshot. If either step
   * throws, the run, the open attempts and the counters are restored to their
   * state before the call, so the same call can be retried.
   */
  private async commit<T>(run: Run, change: () => T): Promise<T> {
    const before = cloneRun(run);
    const starts = new Map(this.attemptStarts);
    try {
      const result = change();
      await this.store.save(run);
      return result;
    } catch (e) {
      this.run = before;
      this.attemptStarts = starts;
      this.stats = accumulate(before);
      throw e;
    }
  }

  private settle(
    run: Run,
    key: string,
    exercise: Exercise,
    state: "passed" | "failed" | "error" | "skipped",
    now: number,
    metrics: MetricMap,
    message: string | undefined
  ): void {
    exercise.state = state;
    exercise.completedAt = new Date(now).toISOString();
    exercise.metrics = { ...exercise.metrics, ...metrics };
    exercise.errorMessage = message ?? null;
    if (run.currentExercise === key) run.currentExercise = null;

    this.stats.record(exercise);

    if (this.stats.completed >= run.totalExercises) {
      assertRunTransition(run.runId, run.state, "completed");
      run.state = "completed";
      run.completedAt = exercise.completedAt;
      this.logger.info(`Run ${run.runId} completed`);
    }
  }

  private closeAttempt(key: string, exercise: Exercise, now: number): void {
    const started = this.attemptStarts.get(key);
    if (started !== undefined) {
      exercise.durations.push(Math.max(now - started, 0));
      this.attemptStarts.delete(key);
    }
  }

  private async transitionRun(state: RunState): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const run = this.requireRun();
      assertRunTransition(run.runId, run.state, state);
      await this.commit(run, () => {
        run.state = state;
        if (isTerminalRunState(state)) {
          run.completedAt = this.timestamp();
          run.currentExercise = null;
        }
      });
      this.logger.info(`Run ${run.runId} is now ${state}`);
    });
  }

  private newExercise(name: string, language: string, maxAttempts: number): Exercise {
    return {
      name,
      language,
      state: "pending",
      attempts: 0,
      maxAttempts,
      durations: [],
      metrics: {},
      startedAt: null,
      completedAt: null,
      errorMessage: null,
    };
  }

  private assertRoomFor(run: Run, key: string): void {
    if (run.exercises.size >= run.totalExercises) {
      throw new ConfigurationError(
        `Cannot track "${key}": run "${run.runId}" already has all ${run.totalExercises} exercises`
      );
    }
  }

  private validMetrics(value: Record<string, unknown>, what: string): MetricMap {
    const parsed = parseMetrics(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `Invalid ${what}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : parsed.error.message}`
      );
    }
    return parsed.data;
  }

  private requireRun(): Run {
    if (!this.run) throw new ConfigurationError("No benchmark run has been started on this tracker");
    return this.run;
  }

  private requireState(state: RunState): Run {
    const run = this.requireRun();
    if (run.state !== state) {
      throw new ConfigurationError(`Run "${run.runId}" is ${run.state}; expected ${state}`);
    }
    return run;
  }

  private timestamp(): string {
    return new Date(this.clock()).toISOString();
  }
}
