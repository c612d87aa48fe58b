/**
 * Bounded retry with a constant delay between attempts.
 */

export interface RetryOptions {
  attempts: number;          // total attempts, clamped to >= 1
  delayMs: number;           // wait between attempts
  shouldRetry?: (err: unknown) => boolean; // false -> rethrow immediately (default: retry everything)
  onRetry?: (err: unknown, attempt: number) => void; // called before each wait
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise(res => setTimeout(res, ms));
}

/**
 * Run `fn` until it resolves or `attempts` runs have failed; the last error is rethrown.
 * `fn` receives the 1-based attempt number.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, Math.floor(opts.attempts));
  const delayMs = Math.max(0, opts.delayMs);
  const wait = opts.sleep ?? sleep;

  let attempt = 0;

  while (true) {
    attempt++;
    try {
      return await fn(attempt);
    } catch (err) {
      if (opts.shouldRetry && !opts.shouldRetry(err)) throw err;
      if (attempt >= attempts) throw err;

      if (opts.onRetry) opts.onRetry(err, attempt);
      await wait(delayMs);
    }
  }
}
