import { describe, expect, it } from "vitest";
import { runBounded } from "../src/executor/run-bounded";

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 1));
}

describe("runBounded", () => {
  it("never exceeds the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const seen: number[] = [];

    await runBounded([1, 2, 3, 4, 5], 2, async (item) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await tick();
      seen.push(item);
      inFlight -= 1;
    });

    expect(peak).toBe(2);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it("stops starting items after a failure and rethrows it", async () => {
    const started: number[] = [];
    const failure = new Error("unit failed");

    await expect(
      runBounded([1, 2, 3, 4], 1, async (item) => {
        started.push(item);
        if (item === 2) {
          throw failure;
        }
      }),
    ).rejects.toBe(failure);
    expect(started).toEqual([1, 2]);
  });

  it("does nothing for an empty list", async () => {
    await expect(runBounded([], 3, async () => undefined)).resolves.toBeUndefined();
  });
});
