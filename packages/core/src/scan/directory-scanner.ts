import { access, readdir } from "node:fs/promises";
import { constants } from "node:fs";
import type { Dirent } from "node:fs";
import { join } from "node:path";
import { PersistenceError, errorMessage, isErrnoException } from "../errors.js";
import { TRACKER_DIR, isStateFileName } from "../store/tracker-store.js";

// YYYY-MM-DD or YYYY-MM-DD-HH-MM-SS, then "--", then a label
const RUN_DIR_PATTERN = /^\d{4}-\d{2}-\d{2}(?:-\d{2}-\d{2}-\d{2})?--.+/;

export interface RunCandidate {
  name: string;
  path: string;
  stateDir: string;
}

export type ScanResult = { status: "found"; candidate: RunCandidate } | { status: "none" };

export function isRunDirName(name: string): boolean {
  return RUN_DIR_PATTERN.test(name);
}

/**
 * Finds benchmark run directories under a root. Names carry their start time
 * up front, so a descending string sort is newest first.
 */
export class DirectoryScanner {
  async listCandidates(root: string): Promise<RunCandidate[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(root, { withFileTypes: true });
    } catch (e) {
      if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "ENOTDIR")) return [];
      throw new PersistenceError(`Cannot scan ${root}: ${errorMessage(e)}`, root, e);
    }

    return entries
      .filter((entry) => entry.isDirectory() && isRunDirName(entry.name))
      .map((entry) => entry.name)
      .sort()
      .reverse()
      .map((name) => ({ name, path: join(root, name), stateDir: join(root, name, TRACKER_DIR) }));
  }

  /**
   * The newest candidate whose tracker directory already holds a readable
   * state file. A directory created moments before its first state write is
   * passed over until the write lands.
   */
  async findLatest(root: string): Promise<ScanResult> {
    for (const candidate of await this.listCandidates(root)) {
      if (await this.isReady(candidate.stateDir)) {
        return { status: "found", candidate };
      }
    }
    return { status: "none" };
  }

  async isReady(stateDir: string): Promise<boolean> {
    let names: string[];
    try {
      names = await readdir(stateDir);
    } catch (e) {
      if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "ENOTDIR")) return false;
      throw new PersistenceError(`Cannot read ${stateDir}: ${errorMessage(e)}`, stateDir, e);
    }

    for (const name of names) {
      if (!isStateFileName(name)) continue;
      try {
        await access(join(stateDir, name), constants.R_OK);
        return true;
      } catch (e) {
        if (isErrnoException(e) && (e.code === "ENOENT" || e.code === "EACCES")) continue;
        throw new PersistenceError(`Cannot access ${join(stateDir, name)}: ${errorMessage(e)}`, stateDir, e);
      }
    }
    return false;
  }
}
