import { describe, expect, it } from "vitest";
import { recordingSleep } from "../testing/fakes";
import { OperationCancelledError } from "./errors";
import { backoffDelay, initialRetryState, nextRetryState, runWithRetry, type RetryPolicy } from "./retry";

const policy: RetryPolicy = { maxAttempts: 3, baseDelayMs: 100 };

describe("nextRetryState", () => {
  it("moves a failed attempt to waiting with exponential backoff", () => {
    const state = nextRetryState(initialRetryState<string>(), { ok: false, error: new Error("reset") }, policy);
    expect(state).toMatchObject({ kind: "waiting", attempt: 1, delayMs: 100 });

    const resumed = nextRetryState(state, undefined, policy);
    expect(resumed).toMatchObject({ kind: "attempting", attempt: 2 });
  });

  it("exhausts after the last permitted attempt", () => {
    const error = new Error("still down");
    const state = nextRetryState({ kind: "attempting", attempt: 3 }, { ok: false, error }, policy);
    expect(state).toEqual({ kind: "exhausted", attempts: 3, lastError: error });
  });

  it("keeps terminal states", () => {
    const done = { kind: "succeeded" as const, attempt: 1, value: "x" };
    expect(nextRetryState(done, undefined, policy)).toBe(done);
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt and honours the cap", () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, 100))).toEqual([100, 200, 400, 800]);
    expect(backoffDelay(4, 100, 300)).toBe(300);
  });
});

describe("runWithRetry", () => {
  it("retries until the operation succeeds", async () => {
    const { sleep, delays } = recordingSleep();
    let calls = 0;
    const result = await runWithRetry(
      async (attempt) => {
        calls += 1;
        if (attempt < 3) {
          throw new Error(`attempt ${attempt} failed`);
        }
        return "ok";
      },
      { policy, sleep },
    );

    expect(result).toEqual({ kind: "succeeded", attempt: 3, value: "ok" });
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it("never exceeds maxAttempts and reports the last error", async () => {
    const { sleep, delays } = recordingSleep();
    const failures: Array<[number, number | undefined]> = [];
    let calls = 0;
    const result = await runWithRetry(
      async (attempt) => {
        calls += 1;
        throw new Error(`boom ${attempt}`);
      },
      { policy, sleep, onAttemptFailed: (attempt, _error, next) => failures.push([attempt, next]) },
    );

    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
    expect(failures).toEqual([
      [1, 100],
      [2, 200],
      [3, undefined],
    ]);
    expect(result.kind).toBe("exhausted");
    if (result.kind === "exhausted") {
      expect(result.attempts).toBe(3);
      expect(result).toHaveProperty("lastError.message", "boom 3");
    }
  });

  it("stops at the next attempt boundary once cancelled", async () => {
    const controller = new AbortController();
    const { sleep } = recordingSleep();
    let calls = 0;

    await expect(
      runWithRetry(
        async () => {
          calls += 1;
          controller.abort();
          throw new Error("reset");
        },
        { policy, sleep, signal: controller.signal },
      ),
    ).rejects.toBeInstanceOf(OperationCancelledError);
    expect(calls).toBe(1);
  });
});
