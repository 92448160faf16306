import { describe, expect, test } from "vitest";

import { runConcurrent } from "../concurrent.js";

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("runConcurrent", () => {
  test("keeps task order regardless of completion order", async () => {
    const tasks = [30, 5, 15].map((ms, i) => async () => {
      await delay(ms);
      return i;
    });

    const results = await runConcurrent(tasks, 3);

    expect(results).toEqual([
      { ok: true, value: 0 },
      { ok: true, value: 1 },
      { ok: true, value: 2 },
    ]);
  });

  test("never exceeds the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    const tasks = Array.from({ length: 10 }, () => async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return true;
    });

    await runConcurrent(tasks, 3);

    expect(peak).toBe(3);
  });

  test("a rejection becomes a miss and siblings still run", async () => {
    const results = await runConcurrent(
      [
        async () => "a",
        async () => {
          throw new Error("boom");
        },
        async () => "c",
      ],
      2
    );

    expect(results).toEqual([
      { ok: true, value: "a" },
      { ok: false, reason: "boom" },
      { ok: true, value: "c" },
    ]);
  });

  test("no tasks resolves to an empty list", async () => {
    expect(await runConcurrent([], 4)).toEqual([]);
  });
});
