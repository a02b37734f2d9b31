import { DirectoryScanner } from "../scan/directory-scanner.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { RunHistory } from "./history.js";
import { TrackerStore } from "./tracker-store.js";

export interface ArchiveResult {
  archived: string[];
  alreadyArchived: string[];
  unreadable: { path: string; message: string }[];
}

/** Copies every exported report found under `root` into the history index. */
export async function archiveReports(
  root: string,
  history: RunHistory,
  options?: { scanner?: DirectoryScanner; logger?: Logger }
): Promise<ArchiveResult> {
  const scanner = options?.scanner ?? new DirectoryScanner();
  const logger = options?.logger ?? silentLogger;
  const result: ArchiveResult = { archived: [], alreadyArchived: [], unreadable: [] };

  for (const candidate of await scanner.listCandidates(root)) {
    const store = new TrackerStore(candidate.stateDir, { logger });
    for (const runId of await store.listReportIds()) {
      const loaded = await store.loadReport(runId);
      if (loaded.status === "not-found") continue;
      if (loaded.status === "unreadable") {
        logger.warn(loaded.error.message);
        result.unreadable.push({ path: loaded.error.path, message: loaded.error.message });
        continue;
      }

      if (history.recordReport(loaded.value)) {
        logger.debug(`Archived ${runId} from ${candidate.name}`);
        result.archived.push(runId);
      } else {
        result.alreadyArchived.push(runId);
      }
    }
  }
  return result;
}
