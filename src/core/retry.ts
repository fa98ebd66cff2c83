import { sleep as defaultSleep, type SleepFn } from "./concurrency";
import { OperationCancelledError } from "./errors";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
}

/**
 * Retry loop states. A run always moves
 * attempting -> succeeded | waiting -> attempting -> ... -> exhausted
 * and never takes more than `policy.maxAttempts` attempts.
 */
export type RetryState<T> =
  | { kind: "attempting"; attempt: number; lastError?: unknown }
  | { kind: "waiting"; attempt: number; delayMs: number; lastError: unknown }
  | { kind: "succeeded"; attempt: number; value: T }
  | { kind: "exhausted"; attempts: number; lastError: unknown };

export type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export type RetryResult<T> = Extract<RetryState<T>, { kind: "succeeded" | "exhausted" }>;

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs?: number): number {
  const delay = baseDelayMs * 2 ** Math.max(0, attempt - 1);
  return maxDelayMs === undefined ? delay : Math.min(delay, maxDelayMs);
}

export function initialRetryState<T>(): RetryState<T> {
  return { kind: "attempting", attempt: 1 };
}

export function nextRetryState<T>(state: RetryState<T>, outcome: AttemptOutcome<T> | undefined, policy: RetryPolicy): RetryState<T> {
  switch (state.kind) {
    case "attempting": {
      if (!outcome) {
        throw new Error("an attempting state needs an attempt outcome");
      }
      if (outcome.ok) {
        return { kind: "succeeded", attempt: state.attempt, value: outcome.value };
      }
      if (state.attempt >= Math.max(1, policy.maxAttempts)) {
        return { kind: "exhausted", attempts: state.attempt, lastError: outcome.error };
      }
      return {
        kind: "waiting",
        attempt: state.attempt,
        delayMs: backoffDelay(state.attempt, policy.baseDelayMs, policy.maxDelayMs),
        lastError: outcome.error,
      };
    }
    case "waiting":
      return { kind: "attempting", attempt: state.attempt + 1, lastError: state.lastError };
    case "succeeded":
    case "exhausted":
      return state;
  }
}

export interface RunWithRetryOptions {
  policy: RetryPolicy;
  signal?: AbortSignal;
  sleep?: SleepFn;
  onAttemptFailed?: (attempt: number, error: unknown, nextDelayMs: number | undefined) => void;
}

/**
 * Drives `operation` through the retry state machine. Cancellation is checked at every
 * attempt boundary and raises `OperationCancelledError`.
 */
export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RunWithRetryOptions,
): Promise<RetryResult<T>> {
  const sleep = options.sleep ?? defaultSleep;
  let state = initialRetryState<T>();

  while (true) {
    switch (state.kind) {
      case "succeeded":
      case "exhausted":
        return state;
      case "waiting":
        await sleep(state.delayMs, options.signal);
        state = nextRetryState(state, undefined, options.policy);
        break;
      case "attempting": {
        if (options.signal?.aborted) {
          throw new OperationCancelledError();
        }
        let outcome: AttemptOutcome<T>;
        try {
          outcome = { ok: true, value: await operation(state.attempt) };
        } catch (error) {
          outcome = { ok: false, error };
        }
        const next = nextRetryState(state, outcome, options.policy);
        if (!outcome.ok) {
          options.onAttemptFailed?.(state.attempt, outcome.error, next.kind === "waiting" ? next.delayMs : undefined);
        }
        state = next;
        break;
      }
    }
  }
}
