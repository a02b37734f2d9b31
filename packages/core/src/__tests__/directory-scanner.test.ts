import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DirectoryScanner, isRunDirName } from "../scan/directory-scanner.js";
import { tempDir } from "./fixtures.js";

describe("DirectoryScanner", () => {
  let root: string;
  const scanner = new DirectoryScanner();

  beforeEach(async () => {
    root = await tempDir();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function runDir(name: string, files: string[] = ["run.json"]): Promise<void> {
    await mkdir(join(root, name, ".tracker"), { recursive: true });
    for (const file of files) {
      await writeFile(join(root, name, ".tracker", file), "{}");
    }
  }

  it("recognises timestamp-prefixed run directory names", () => {
    expect(isRunDirName("2025-01-01--x")).toBe(true);
    expect(isRunDirName("2025-01-01-10-30-00--sonnet-python")).toBe(true);
    expect(isRunDirName("2025-01-01-x")).toBe(false);
    expect(isRunDirName("2025-01-01--")).toBe(false);
    expect(isRunDirName("latest")).toBe(false);
  });

  it("picks the newest run directory", async () => {
    await runDir("2025-01-01--x");
    await runDir("2025-01-02--y");
    await runDir("2025-01-01--z");

    const result = await scanner.findLatest(root);
    expect(result.status).toBe("found");
    if (result.status === "found") {
      expect(result.candidate).toEqual({
        name: "2025-01-02--y",
        path: join(root, "2025-01-02--y"),
        stateDir: join(root, "2025-01-02--y", ".tracker"),
      });
    }
  });

  it("lists candidates newest first and ignores everything else", async () => {
    await runDir("2025-01-01--x");
    await runDir("2025-01-02--y");
    await runDir("2025-01-01--z");
    await mkdir(join(root, "scratch"));
    await writeFile(join(root, "2025-01-03--file"), "");

    const names = (await scanner.listCandidates(root)).map((c) => c.name);
    expect(names).toEqual(["2025-01-02--y", "2025-01-01--z", "2025-01-01--x"]);
  });

  it("skips run directories whose state has not been written yet", async () => {
    await runDir("2025-01-01--ready");
    await mkdir(join(root, "2025-01-02--no-tracker"));
    await runDir("2025-01-03--empty", []);
    await runDir("2025-01-04--only-temp-and-report", [".r1.json.1.abcd.tmp", "report_r1.json"]);

    const result = await scanner.findLatest(root);
    expect(result.status === "found" ? result.candidate.name : null).toBe("2025-01-01--ready");
  });

  it("finds nothing under a missing root", async () => {
    const missing = join(root, "does-not-exist");
    expect(await scanner.listCandidates(missing)).toEqual([]);
    expect(await scanner.findLatest(missing)).toEqual({ status: "none" });
  });
});
