import { CancelledError, PollTimeoutError, TransientError } from './errors.js';

export interface PollPolicy {
  intervalMs: number;
  maxIntervalMs: number;
  backoffFactor: number;
  timeoutMs: number;
}

export type PollResult<T> = { done: true; value: T } | { done: false };

export interface PollOptions {
  /** Used in the timeout message, e.g. "SSH readiness". */
  label: string;
  signal?: AbortSignal;
  onTransient?: (error: TransientError, attempt: number) => void;
  /** Wait one interval before the first attempt. */
  delayFirst?: boolean;
  now?: () => number;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
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
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

export function nextDelay(current: number, policy: PollPolicy): number {
  return Math.min(Math.round(current * policy.backoffFactor), policy.maxIntervalMs);
}

/**
 * Calls `attempt` until it reports done. TransientErrors are handed to
 * `onTransient` and retried; anything else propagates unchanged.
 */
export async function pollUntil<T>(
  attempt: (attemptNumber: number) => Promise<PollResult<T>>,
  policy: PollPolicy,
  options: PollOptions,
): Promise<T> {
  const now = options.now ?? Date.now;
  const startedAt = now();
  let delay = policy.intervalMs;
  let attempts = 0;
  let lastError: TransientError | undefined;

  if (options.delayFirst) {
    await sleep(delay, options.signal);
  }

  while (true) {
    throwIfCancelled(options.signal);
    attempts++;

    try {
      const result = await attempt(attempts);
      if (result.done) {
        return result.value;
      }
    } catch (error) {
      if (!(error instanceof TransientError)) {
        throw error;
      }
      lastError = error;
      options.onTransient?.(error, attempts);
    }

    const elapsed = now() - startedAt;
    if (elapsed + delay > policy.timeoutMs) {
      throw new PollTimeoutError(options.label, elapsed, attempts, lastError);
    }

    await sleep(delay, options.signal);
    delay = nextDelay(delay, policy);
  }
}
