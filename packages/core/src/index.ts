// Errors & logging
export {
  TrackerError,
  ConfigurationError,
  PersistenceError,
  NotFoundError,
  errorMessage,
} from "./errors.js";
export type { TrackerErrorCode } from "./errors.js";
export { silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Data model
export {
  RUN_STATES,
  EXERCISE_STATES,
  exerciseKey,
  parseExerciseKey,
  isTerminalRunState,
  isTerminalExerciseState,
  cloneRun,
} from "./run/types.js";
export type {
  Run,
  RunState,
  TerminalRunState,
  Exercise,
  ExerciseState,
  TerminalExerciseState,
  JsonValue,
  MetricMap,
  Progress,
} from "./run/types.js";
export { canTransitionRun, canTransitionExercise } from "./run/transitions.js";
export { RunSnapshotSchema, toSnapshot, fromSnapshot } from "./run/schema.js";
export type { RunSnapshot, ExerciseSnapshot } from "./run/schema.js";

// Tracker
export { BenchmarkTracker, DEFAULT_MAX_ATTEMPTS } from "./tracker.js";
export type { TrackerOptions, StartRunOptions } from "./tracker.js";

// Store
export { TrackerStore, TRACKER_DIR, REPORT_PREFIX, assertValidRunId } from "./store/tracker-store.js";
export type { LoadResult, RunSnapshotReader, SaveOptions, TrackerStoreOptions } from "./store/tracker-store.js";
export type { RunHistory, HistoryEntry, ExerciseOutcome, ArchivedRun } from "./store/history.js";
export { SqliteRunHistory } from "./store/sqlite.js";
export { archiveReports } from "./store/archive.js";
export type { ArchiveResult } from "./store/archive.js";

// Scanner
export { DirectoryScanner, isRunDirName } from "./scan/directory-scanner.js";
export type { RunCandidate, ScanResult } from "./scan/directory-scanner.js";

// Statistics
export {
  StatisticsAccumulator,
  computeStatistics,
  computeProgress,
  progressOf,
  extractUsage,
} from "./stats/engine.js";
export type { StatisticsSnapshot, LanguageStatistics, ExerciseUsage } from "./stats/engine.js";

// Reports
export { buildTrackerReport, generateJsonReport, TrackerReportSchema, TRACKER_VERSION } from "./report/json.js";
export type { TrackerReport } from "./report/json.js";
export { renderMonitorFrame, printTrackerReport, progressBar, formatDuration, truncate } from "./report/terminal.js";
export type { FrameRenderOptions } from "./report/terminal.js";

// Monitor
export { Monitor, resolveStateDir, DEFAULT_REFRESH_INTERVAL_MS } from "./monitor/monitor.js";
export type { MonitorFrame, MonitorOptions, MonitorTarget } from "./monitor/monitor.js";

// Diff
export { diffRuns } from "./diff/engine.js";
export type { DiffReport, ExerciseDiff, DiffStatus, DiffSummary } from "./diff/engine.js";
export { checkRegressions, resolveRunRef } from "./diff/regression.js";
export type { RegressionCheckResult } from "./diff/regression.js";
