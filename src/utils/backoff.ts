export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the capped delay added or removed at random. */
  jitter?: number;
}

/**
 * Exponential backoff with symmetric jitter:
 * base · 2^(attempt-1), capped at max, then ±25 % by default.
 * `random` returns a value in [0, 1).
 */
export function calculateDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  const exponential = options.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, options.maxDelayMs);
  const spread = capped * (options.jitter ?? 0.25) * (random() * 2 - 1);
  return Math.max(0, Math.floor(capped + spread));
}

export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`; rejects with AbortError as soon as `signal` aborts. */
export const sleep: Sleep = (ms, signal) => {
  if (signal?.aborted) return Promise.reject(new AbortError());
  if (!signal) return new Promise((resolve) => setTimeout(resolve, ms));

  return new Promise((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort(): void {
      clearTimeout(timeoutId);
      reject(new AbortError());
    }

    signal.addEventListener('abort', onAbort, { once: true });
  });
};
