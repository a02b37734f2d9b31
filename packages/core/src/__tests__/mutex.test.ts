import { describe, expect, it } from "vitest";
import { Mutex } from "../utils/mutex.js";

describe("Mutex", () => {
  it("runs tasks one at a time in arrival order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const slow = mutex.runExclusive(async () => {
      events.push("slow:start");
      await new Promise((resolve) => setTimeout(resolve, 20));
      events.push("slow:end");
      return 1;
    });
    const fast = mutex.runExclusive(() => {
      events.push("fast");
      return 2;
    });

    expect(mutex.locked).toBe(true);
    expect(await Promise.all([slow, fast])).toEqual([1, 2]);
    expect(events).toEqual(["slow:start", "slow:end", "fast"]);
    expect(mutex.locked).toBe(false);
  });

  it("releases the lock when a task throws", async () => {
    const mutex = new Mutex();

    const failing = mutex.runExclusive(async () => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(async () => "ran");

    await expect(failing).rejects.toThrow("boom");
    expect(await next).toBe("ran");
  });
});
