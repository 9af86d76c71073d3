export interface RetryOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly signal?: AbortSignal;
  /** Return false to stop retrying and rethrow immediately. */
  readonly shouldRetry?: (err: unknown, attempt: number) => boolean;
  readonly onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 200;
const DEFAULT_MAX_DELAY_MS = 10_000;

function jitteredDelay(baseMs: number, attempt: number, maxMs: number): number {
  const exponential = baseMs * 2 ** attempt;
  const capped = Math.min(exponential, maxMs);
  return capped * (0.5 + Math.random() * 0.5);
}

function wait(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(resolve, delayMs);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(signal.reason);
      },
      { once: true },
    );
  });
}

export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxAttempts = opts?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = opts?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = opts?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    opts?.signal?.throwIfAborted();

    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (opts?.shouldRetry && !opts.shouldRetry(err, attempt)) {
        throw err;
      }
      if (attempt < maxAttempts - 1) {
        const delay = jitteredDelay(baseDelayMs, attempt, maxDelayMs);
        opts?.onRetry?.(err, attempt, delay);
        await wait(delay, opts?.signal);
      }
    }
  }

  throw lastError;
}
