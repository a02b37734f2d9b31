import { NotFoundError } from "../errors.js";
import type { RunHistory } from "../store/history.js";
import { diffRuns } from "./engine.js";
import type { DiffReport } from "./engine.js";

export interface RegressionCheckResult {
  diff: DiffReport;
  exitCode: 0 | 1;
}

export function checkRegressions(history: RunHistory, beforeRun: string, afterRun: string): RegressionCheckResult {
  const before = history.loadRun(beforeRun);
  if (!before) throw new NotFoundError(`Run "${beforeRun}" is not in the history. Run \`bench-tracker archive\` first.`);

  const after = history.loadRun(afterRun);
  if (!after) throw new NotFoundError(`Run "${afterRun}" is not in the history. Run \`bench-tracker archive\` first.`);

  const diff = diffRuns(beforeRun, before.exercises, afterRun, after.exercises);
  return { diff, exitCode: diff.hasRegressions ? 1 : 0 };
}

/** Accepts a run id or "latest" / "previous" (by start time). */
export function resolveRunRef(history: RunHistory, ref: string): string {
  if (ref !== "latest" && ref !== "previous") return ref;

  const runs = history.listRuns(2);
  if (ref === "latest") {
    const latest = runs[0];
    if (!latest) throw new NotFoundError("No runs archived yet.");
    return latest.runId;
  }
  const previous = runs[1];
  if (!previous) throw new NotFoundError("Need at least 2 archived runs to use 'previous'.");
  return previous.runId;
}
