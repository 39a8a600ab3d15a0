import type { Logger } from "@slack/logger";
import { RequestTimeoutError, RunCancelledError, errorMessage, isRetryableError } from "./errors.js";
import type { RetryPolicy } from "./types.js";

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 15_000,
  jitter: 0.3,
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Delay before the retry that follows failed attempt number `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  const jitter = Math.min(Math.max(policy.jitter, 0), 1);
  if (jitter === 0) return capped;
  return Math.round(capped * (1 - jitter + random() * jitter));
}

export type RetryOptions = {
  policy: RetryPolicy;
  label: string;
  isRetryable?: (err: unknown) => boolean;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
};

export async function withRetry<T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, label, isRetryable = isRetryableError, logger, signal, sleep: wait = sleep } = options;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await task(attempt);
    } catch (err) {
      if (attempt >= attempts || !isRetryable(err)) throw err;
      if (signal?.aborted) throw new RunCancelledError(`${label} was cancelled while waiting to retry.`);

      const delayMs = backoffDelay(policy, attempt);
      logger?.warn(`${label} failed (attempt ${attempt}/${attempts}), retrying in ${delayMs}ms: ${errorMessage(err)}`);
      await wait(delayMs);
    }
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  if (timeoutMs <= 0) {
    throw new RequestTimeoutError(`${label} has no time budget left.`);
  }

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new RequestTimeoutError(`${label} exceeded ${timeoutMs}ms.`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
  }
}

/** Runs one platform call under the per-call timeout and the transient-error retry policy. */
export type CallRunner = <T>(label: string, call: () => Promise<T>) => Promise<T>;

export function createCallRunner(args: {
  policy: RetryPolicy;
  timeoutMs: number;
  logger?: Logger;
  signal?: AbortSignal;
  sleep?: Sleep;
}): CallRunner {
  const { policy, timeoutMs, logger, signal, sleep: wait } = args;
  return <T>(label: string, call: () => Promise<T>) =>
    withRetry(() => withTimeout(call(), timeoutMs, label), {
      policy,
      label,
      logger,
      signal,
      sleep: wait,
    });
}
