import { describe, expect, it } from "vitest";
import { processWithConcurrency, sleep } from "./concurrency";

describe("processWithConcurrency", () => {
  it("visits every item with at most the given number in flight", async () => {
    const visited: number[] = [];
    let inFlight = 0;
    let peak = 0;

    await processWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      visited.push(item);
      inFlight -= 1;
    });

    expect([...visited].sort()).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });

  it("stops taking items once a worker throws and rethrows the first error", async () => {
    const started: number[] = [];
    const failure = new Error("database is locked");

    const result = processWithConcurrency([0, 1, 2, 3, 4], 2, async (item) => {
      started.push(item);
      if (item === 0) {
        throw failure;
      }
      await new Promise((resolve) => setTimeout(resolve, 5));
    });

    await expect(result).rejects.toBe(failure);
    expect(started).toEqual([0, 1]);
  });

  it("does nothing for an empty list", async () => {
    const started: number[] = [];
    await processWithConcurrency<number>([], 4, async (item) => {
      started.push(item);
    });
    expect(started).toEqual([]);
  });
});

describe("sleep", () => {
  it("resolves at once for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    const startedAt = Date.now();

    await sleep(60_000, controller.signal);

    expect(Date.now() - startedAt).toBeLessThan(1_000);
  });
});
