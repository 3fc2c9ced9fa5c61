import { CallTimeoutError, isTransient } from "@/sync/errors";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
};

/** Time source for backoff waits. Tests swap in a manual clock. */
export interface Clock {
  now(): number;
  wait(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  wait: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/** Delay before attempt `attempt + 1`, given `attempt` attempts have failed. */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

/** Reject with CallTimeoutError if `action` does not settle within `timeoutMs`. */
export async function withTimeout<T>(action: () => Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new CallTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([action(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run a read with the per-call timeout, retrying transient failures.
 * Plan items do not go through here; the executor schedules their retries.
 */
export async function readWithRetry<T>(
  action: () => Promise<T>,
  options: { label: string; timeoutMs: number; policy: RetryPolicy; clock: Clock },
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await withTimeout(action, options.timeoutMs, options.label);
    } catch (error) {
      if (!isTransient(error) || attempt >= options.policy.maxAttempts) throw error;
      await options.clock.wait(backoffDelay(options.policy, attempt));
    }
  }
}
