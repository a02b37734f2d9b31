import { join } from "node:path";
import { cosmiconfig } from "cosmiconfig";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "@bench-tracker/core";

const ConfigSchema = z
  .object({
    /** Directory the benchmark harness creates run directories in. */
    root: z.string().min(1).default("tmp.benchmarks"),
    monitor: z
      .object({
        /** Seconds between polls. */
        refreshInterval: z.number().positive().default(5),
        autoDetect: z.boolean().default(true),
      })
      .strict()
      .default({}),
    history: z
      .object({
        path: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
    verbose: z.boolean().default(false),
  })
  .strict();

export type BenchTrackerConfigInput = z.input<typeof ConfigSchema>;

export interface BenchTrackerConfig {
  root: string;
  monitor: { refreshInterval: number; autoDetect: boolean };
  history: { path: string };
  verbose: boolean;
}

export function defineConfig(config: BenchTrackerConfigInput): BenchTrackerConfigInput {
  return config;
}

export async function loadConfig(searchFrom?: string): Promise<BenchTrackerConfig> {
  const explorer = cosmiconfig("bench-tracker", {
    searchPlaces: [
      "bench-tracker.config.ts",
      "bench-tracker.config.js",
      "bench-tracker.config.json",
      ".bench-trackerrc",
      ".bench-trackerrc.json",
    ],
  });

  let result: Awaited<ReturnType<typeof explorer.search>>;
  try {
    result = searchFrom ? await explorer.search(searchFrom) : await explorer.search();
  } catch (e) {
    throw new ConfigurationError(`Failed to load config: ${errorMessage(e)}`, e);
  }

  const raw: unknown = !result || result.isEmpty ? {} : interpolateEnvVars(result.config);
  return parseConfig(raw, result?.filepath);
}

export function parseConfig(raw: unknown, source = "config"): BenchTrackerConfig {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ConfigurationError(`Invalid ${source}: ${where}${issue?.message ?? parsed.error.message}`, parsed.error);
  }

  const { root, monitor, history, verbose } = parsed.data;
  return {
    root,
    monitor,
    history: { path: history.path ?? join(root, ".history.db") },
    verbose,
  };
}

export function interpolateEnvVars(value: unknown): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{env\.(\w+)\}/g, (_, key: string) => process.env[key] ?? "");
  }
  if (Array.isArray(value)) {
    return value.map(interpolateEnvVars);
  }
  if (typeof value === "object" && value !== null) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateEnvVars(entry);
    }
    return result;
  }
  return value;
}
