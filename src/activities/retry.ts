import { setTimeout as delay } from "node:timers/promises";
import { TransientError, toActivityError, type ActivityError } from "./errors.js";
import { getLogger } from "../util/logger.js";

const log = getLogger("retry");

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  /** Per-attempt timeout. 0 disables it. */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 2_000,
  maxDelayMs: 30_000,
  timeoutMs: 120_000,
};

export type ActivityOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: ActivityError; attempts: number };

/** Backoff before retry number `attempt` (1-based): initial, 2x, 4x ... capped. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.initialDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

async function attemptOnce<T>(
  name: string,
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) return fn(controller.signal);

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientError(`${name} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run one activity under the retry policy. Transient failures are retried
 * with exponential backoff until the attempt budget is spent; permanent
 * failures return immediately. Never throws.
 */
export async function runActivity<T>(
  name: string,
  fn: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  sleep: (ms: number) => Promise<unknown> = delay,
): Promise<ActivityOutcome<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      const value = await attemptOnce(name, fn, policy.timeoutMs);
      return { ok: true, value, attempts: attempt };
    } catch (e) {
      const error = toActivityError(e);

      if (error.kind === "permanent" || attempt >= maxAttempts) {
        log.warn({ activity: name, attempts: attempt, kind: error.kind, err: error }, "activity failed");
        return { ok: false, error, attempts: attempt };
      }

      const wait = backoffDelay(policy, attempt);
      log.warn(
        { activity: name, attempt, nextRetryMs: wait, error: error.message },
        "transient activity failure, retrying",
      );
      await sleep(wait);
    }
  }
}
