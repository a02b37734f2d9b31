import { z } from "zod";
import { RunSnapshotSchema, toSnapshot } from "../run/schema.js";
import type { RunSnapshot } from "../run/schema.js";
import type { Progress, Run } from "../run/types.js";
import type { LanguageStatistics, StatisticsSnapshot } from "../stats/engine.js";

export const TRACKER_VERSION = "1.0.0";

export interface TrackerReport {
  metadata: {
    generated_at: string;
    tracker_version: string;
  };
  run: RunSnapshot;
  progress: Progress;
  statistics: StatisticsSnapshot;
}

const LanguageStatisticsSchema: z.ZodType<LanguageStatistics> = z.object({
  total: z.number(),
  completed: z.number(),
  passed: z.number(),
  failed: z.number(),
  skipped: z.number(),
  errored: z.number(),
  passRate: z.number(),
});

const StatisticsSnapshotSchema: z.ZodType<StatisticsSnapshot> = z.object({
  runId: z.string(),
  totalExercises: z.number(),
  completed: z.number(),
  passed: z.number(),
  failed: z.number(),
  skipped: z.number(),
  errored: z.number(),
  passRate: z.number(),
  successRate: z.number(),
  totalCost: z.number(),
  totalTokens: z.number(),
  tokensSent: z.number(),
  tokensReceived: z.number(),
  avgCostPerExercise: z.number(),
  avgTokensPerExercise: z.number(),
  errorCounters: z.record(z.string(), z.number()),
  byLanguage: z.record(z.string(), LanguageStatisticsSchema),
  averageDurationMs: z.number().nullable(),
  estimatedRemainingMs: z.number().nullable(),
});

export const TrackerReportSchema = z.object({
  metadata: z.object({
    generated_at: z.string(),
    tracker_version: z.string(),
  }),
  run: RunSnapshotSchema,
  progress: z.object({
    completed: z.number(),
    total: z.number(),
    percentage: z.number(),
  }),
  statistics: StatisticsSnapshotSchema,
});

export function buildTrackerReport(
  run: Run,
  progress: Progress,
  statistics: StatisticsSnapshot,
  generatedAt: Date = new Date()
): TrackerReport {
  return {
    metadata: {
      generated_at: generatedAt.toISOString(),
      tracker_version: TRACKER_VERSION,
    },
    run: toSnapshot(run),
    progress: { ...progress },
    statistics,
  };
}

export function generateJsonReport(report: TrackerReport): string {
  return JSON.stringify(report, null, 2);
}
