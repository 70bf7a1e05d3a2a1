import { FetchAbortedError, FetchFailedError, errorMessage } from './errors';

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 16000,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Thrown by an attempt to ask for another one (timeout, 429, 5xx, network). */
export class TransientError extends Error {
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientError';
    this.retryAfterMs = retryAfterMs;
  }
}

export type RetryNotice = {
  attempt: number;
  delayMs: number;
  error: TransientError;
};

export type RetryOptions = {
  policy?: RetryPolicy;
  signal?: AbortSignal;
  sleep?: Sleep;
  random?: () => number;
  onRetry?: (notice: RetryNotice) => void;
};

export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new FetchAbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new FetchAbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Exponential backoff with equal jitter: half of the capped exponential delay
 * is fixed, the other half is random.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const exp = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  return Math.round(exp / 2 + random() * (exp / 2));
}

/**
 * Run `fn` until it succeeds, throws a non-transient error, or the attempt
 * ceiling is reached. Cancellation is checked between attempts and while
 * waiting, never inside a running attempt.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? sleep;
  const random = options.random ?? Math.random;
  let lastError: TransientError | null = null;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (options.signal?.aborted) throw new FetchAbortedError();

    try {
      return await fn(attempt);
    } catch (err) {
      if (!(err instanceof TransientError)) throw err;
      lastError = err;
      if (attempt === policy.maxAttempts) break;

      const delayMs =
        err.retryAfterMs !== null ? Math.min(err.retryAfterMs, policy.maxDelayMs) : backoffDelay(attempt, policy, random);
      options.onRetry?.({ attempt, delayMs, error: err });
      await wait(delayMs, options.signal);
    }
  }

  throw new FetchFailedError(
    `Remote request failed after ${policy.maxAttempts} attempt(s): ${errorMessage(lastError)}`,
    policy.maxAttempts,
    { cause: lastError },
  );
}
