import { FetchError, errorMessage } from "./errors";
import { Logger } from "./logger";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface DelayPolicy {
  minMs: number;
  maxMs: number;
}

export function randomDelayMs(policy: DelayPolicy, random: () => number = Math.random): number {
  const span = Math.max(0, policy.maxMs - policy.minMs);
  return Math.round(policy.minMs + span * random());
}

/** Pause between consecutive requests to one source; the only rate control there is. */
export function createPacer(policy: DelayPolicy, pause: Sleep = sleep, random: () => number = Math.random): () => Promise<void> {
  return () => pause(randomDelayMs(policy, random));
}

export interface RetryOptions {
  attempts?: number;
  logger?: Logger;
}

/**
 * Runs `work` until it succeeds or `attempts` (default 2: one retry) are used up.
 * Only `FetchError` is retried; anything else propagates on the first throw.
 */
export async function withRetry<T>(label: string, work: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 2);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await work(attempt);
    } catch (error) {
      if (!(error instanceof FetchError)) {
        throw error;
      }
      lastError = error;
      if (attempt < attempts) {
        options.logger?.warn("fetch_retry", { label, attempt, url: error.url, error: errorMessage(error) });
      }
    }
  }

  throw lastError;
}
