import { describe, expect, it } from "vitest";
import { runBounded } from "./concurrency";

function tick() {
  return new Promise<void>((r) => setTimeout(r, 1));
}

describe("runBounded", () => {
  it("never runs more than `limit` workers at once and keeps results in input order", async () => {
    let inFlight = 0;
    let peak = 0;

    const results = await runBounded([1, 2, 3, 4, 5, 6], 2, async (n) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight -= 1;
      return n * 2;
    });

    expect(peak).toBe(2);
    expect(results).toEqual([2, 4, 6, 8, 10, 12].map((value) => ({ status: "fulfilled", value })));
  });

  it("isolates a failing item from the rest", async () => {
    const boom = new Error("boom");
    const results = await runBounded(["a", "b", "c"], 3, async (s) => {
      if (s === "b") throw boom;
      return s.toUpperCase();
    });

    expect(results).toEqual([
      { status: "fulfilled", value: "A" },
      { status: "rejected", reason: boom },
      { status: "fulfilled", value: "C" },
    ]);
  });

  it("treats a non-positive limit as one and handles an empty list", async () => {
    let peak = 0;
    let inFlight = 0;
    await runBounded([1, 2, 3], 0, async (n) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight -= 1;
      return n;
    });

    expect(peak).toBe(1);
    expect(await runBounded([], 4, async (n: number) => n)).toEqual([]);
  });
});
