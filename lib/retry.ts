/**
 * Bounded retry with cooperative cancellation.
 *
 * One loop serves both long-running waits in the engine: the artifact readiness
 * probe (bounded, 5s cadence) and the remote status poll (unbounded, 30s cadence).
 * Each attempt is classified as done / retry; the loop sleeps a fixed delay between
 * attempts and checks the abort signal before every attempt and after every wait.
 */

import { ScanSyncError } from './errors';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export class CancelledError extends ScanSyncError {
  constructor(message = 'Operation cancelled') {
    super('cancelled', message);
    this.name = 'CancelledError';
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/** setTimeout-based delay that rejects with CancelledError as soon as the signal aborts. */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export type AttemptVerdict<T> =
  | { done: true; value: T }
  | { done: false; reason?: string };

export interface RetryLoopOptions<T> {
  /** One probe/refresh. May throw; see `onError`. */
  attempt: (attemptNumber: number, signal?: AbortSignal) => Promise<AttemptVerdict<T>>;
  delayMs: number;
  /** Retries after the first attempt. Omit for a loop that runs until done or cancelled. */
  maxRetries?: number;
  signal?: AbortSignal;
  sleep?: Sleep;
  /** Delay before the very first attempt (pollers tick after one interval). */
  initialDelay?: boolean;
  /** Called after a not-ready verdict, with the retry count so far. */
  onRetry?: (retryCount: number, reason?: string) => void;
  /**
   * Called when an attempt throws. Return 'retry' to absorb the error and keep
   * going; anything else rethrows it.
   */
  onError?: (error: unknown, attemptNumber: number) => 'retry' | 'fail';
}

export type RetryLoopResult<T> =
  | { outcome: 'done'; value: T; retryCount: number }
  | { outcome: 'exhausted'; retryCount: number };

export async function runRetryLoop<T>(options: RetryLoopOptions<T>): Promise<RetryLoopResult<T>> {
  const { attempt, delayMs, maxRetries, signal, onRetry, onError } = options;
  const wait = options.sleep ?? sleep;
  let retryCount = 0;
  let attemptNumber = 0;

  if (options.initialDelay) {
    await wait(delayMs, signal);
  }

  for (;;) {
    throwIfAborted(signal);
    attemptNumber++;

    let verdict: AttemptVerdict<T>;
    try {
      verdict = await attempt(attemptNumber, signal);
    } catch (error) {
      if (signal?.aborted) throw new CancelledError();
      if (!onError || onError(error, attemptNumber) !== 'retry') throw error;
      verdict = { done: false, reason: 'error' };
    }

    throwIfAborted(signal);
    if (verdict.done) {
      return { outcome: 'done', value: verdict.value, retryCount };
    }

    retryCount++;
    if (maxRetries !== undefined && retryCount > maxRetries) {
      return { outcome: 'exhausted', retryCount };
    }
    onRetry?.(retryCount, verdict.reason);
    await wait(delayMs, signal);
  }
}
