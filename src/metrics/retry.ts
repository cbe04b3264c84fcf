import * as core from "@actions/core";
import { setTimeout as delay } from "node:timers/promises";
import type { CreatorMatchConfig } from "../config.js";
import { MetricsApiError } from "./errors.js";

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the computed delay added or removed at random. */
  jitter: number;
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const realSleeper: Sleeper = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function retryPolicyFromConfig(
  retry: CreatorMatchConfig["retry"]
): RetryPolicy {
  return {
    maxRetries: retry.max_retries,
    baseDelayMs: retry.base_delay_ms,
    maxDelayMs: retry.max_delay_ms,
    jitter: retry.jitter,
  };
}

export function computeDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponential = Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  const spread = exponential * policy.jitter * (random() * 2 - 1);
  return Math.min(policy.maxDelayMs, Math.max(0, Math.round(exponential + spread)));
}

/** Accepts delta-seconds or an HTTP date. Returns milliseconds, or null. */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now()
): number | null {
  if (header === null) return null;
  const value = header.trim();
  if (value === "") return null;
  if (/^\d+(\.\d+)?$/.test(value)) return Math.round(Number(value) * 1000);

  const date = Date.parse(value);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

export interface RetryOptions {
  sleep?: Sleeper;
  random?: () => number;
  signal?: AbortSignal;
  label?: string;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? realSleeper;
  const label = options.label ?? "request";

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof MetricsApiError) || !error.retryable) throw error;
      if (attempt >= policy.maxRetries || options.signal?.aborted) throw error;

      const waitMs =
        error.retryAfterMs !== null
          ? Math.min(error.retryAfterMs, policy.maxDelayMs)
          : computeDelay(policy, attempt, options.random);
      core.info(
        `  Retry ${attempt + 1}/${policy.maxRetries} for ${label} in ${waitMs}ms: ${error.message}`
      );
      await sleep(waitMs, options.signal);
    }
  }
}
