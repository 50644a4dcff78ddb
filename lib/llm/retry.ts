/**
 * Exponential backoff around a single generation call. Every invocation of
 * `withRetry` owns its attempt counter and delays; nothing survives between
 * calls, so concurrent chunks never see each other's retry state.
 */

import { CancelledRunError, throwIfCancelled } from '@/lib/errors';
import { GenerationError } from './types';

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Jitter factor 0-1 */
  jitter: number;
}

export interface RetryOptions extends BackoffOptions {
  /** Total attempts including the first one. */
  maxAttempts: number;
  signal?: AbortSignal;
  random?: () => number;
  onRetry?: (attempt: number, error: GenerationError, delayMs: number) => void;
}

/** Thrown when the call gave up: out of attempts, or a permanent error. */
export class RetryError extends Error {
  readonly attempts: number;
  readonly exhausted: boolean;

  constructor(attempts: number, exhausted: boolean, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(exhausted ? `gave up after ${attempts} attempt(s): ${reason}` : `permanent failure: ${reason}`, { cause });
    this.name = 'RetryError';
    this.attempts = attempts;
    this.exhausted = exhausted;
  }
}

export function computeDelay(attempt: number, opts: BackoffOptions, random: () => number = Math.random): number {
  const baseDelay = Math.min(opts.initialDelayMs * Math.pow(opts.multiplier, attempt - 1), opts.maxDelayMs);
  const jitterRange = baseDelay * opts.jitter;
  const jitter = (random() - 0.5) * 2 * jitterRange;
  return Math.max(0, Math.round(baseDelay + jitter));
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledRunError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledRunError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function isTransient(err: unknown): err is GenerationError {
  return err instanceof GenerationError && err.transient;
}

/**
 * Runs `fn` until it succeeds, a permanent error occurs, or attempts run out.
 * Cancellation wins over everything: an aborted signal always surfaces as
 * CancelledRunError, whatever the call itself threw.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    throwIfCancelled(opts.signal);
    try {
      return await fn(attempt);
    } catch (err) {
      if (opts.signal?.aborted || err instanceof CancelledRunError) {
        throw new CancelledRunError();
      }
      if (!isTransient(err)) {
        throw new RetryError(attempt, false, err);
      }
      if (attempt >= maxAttempts) {
        throw new RetryError(attempt, true, err);
      }
      const delay = err.retryAfterMs ?? computeDelay(attempt, opts, opts.random);
      const capped = Math.min(delay, opts.maxDelayMs);
      opts.onRetry?.(attempt, err, capped);
      await sleep(capped, opts.signal);
    }
  }
}
