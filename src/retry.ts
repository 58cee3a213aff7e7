import { setTimeout as delay } from "node:timers/promises";
import type { ServiceConfig } from "./config.js";
import { RelayError, isRetryableReason } from "./errors.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export type RetryPolicy = {
  name: string;
  maxAttempts: number;
  backoffMs: (attempt: number) => number;
  isRetryable: (err: unknown) => boolean;
};

export type RetryOptions = {
  sleep?: Sleep;
  signal?: AbortSignal;
  onRetry?: (err: unknown, attempt: number, waitMs: number) => void;
};

export function linearBackoff(baseMs: number): (attempt: number) => number {
  return (attempt) => baseMs * attempt;
}

export function fixedBackoff(ms: number): (attempt: number) => number {
  return () => ms;
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof RelayError && isRetryableReason(err.reason);
}

function cancelledError(policy: RetryPolicy, cause?: unknown): RelayError {
  return new RelayError("cancelled", `${policy.name} cancelled`, { cause });
}

/**
 * Runs `operation` until it resolves, the error is not retryable, or the policy
 * runs out of attempts. The last error is rethrown.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    if (options.signal?.aborted) {
      throw cancelledError(policy);
    }
    try {
      return await operation(attempt);
    }
    catch (err) {
      if (attempt >= attempts || !policy.isRetryable(err)) {
        throw err;
      }
      const waitMs = policy.backoffMs(attempt);
      options.onRetry?.(err, attempt, waitMs);
      if (waitMs > 0) {
        try {
          await sleep(waitMs, options.signal);
        }
        catch (sleepErr) {
          throw cancelledError(policy, sleepErr);
        }
      }
    }
  }
}

export function probeRetryPolicy(config: ServiceConfig): RetryPolicy {
  return {
    name: "device probe",
    maxAttempts: config.PROBE_MAX_ATTEMPTS,
    backoffMs: fixedBackoff(config.PROBE_RETRY_DELAY_MS),
    isRetryable: isRetryableError
  };
}

export function pushRetryPolicy(config: ServiceConfig): RetryPolicy {
  return {
    name: "device push",
    maxAttempts: config.PUSH_MAX_ATTEMPTS,
    backoffMs: linearBackoff(config.PUSH_RETRY_BASE_MS),
    isRetryable: isRetryableError
  };
}

export function weatherRetryPolicy(config: ServiceConfig): RetryPolicy {
  return {
    name: "weather fetch",
    maxAttempts: config.WEATHER_MAX_ATTEMPTS,
    backoffMs: linearBackoff(config.WEATHER_RETRY_BASE_MS),
    isRetryable: isRetryableError
  };
}
