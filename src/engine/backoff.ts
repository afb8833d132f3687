/**
 * Exponential backoff with jitter for worker retries.
 *
 * Usage:
 *   const backoff = new Backoff({ baseMs: 500 });
 *   await backoff.wait(signal);   // ~500ms
 *   await backoff.wait(signal);   // ~1000ms
 */

export interface BackoffOptions {
  baseMs?: number;
  maxMs?: number;
  factor?: number;
  /** Fraction of the delay randomized either way (0 = deterministic) */
  jitter?: number;
}

export class Backoff {
  private readonly baseMs: number;
  private readonly maxMs: number;
  private readonly factor: number;
  private readonly jitter: number;
  private failures = 0;

  constructor(opts?: BackoffOptions) {
    this.baseMs = opts?.baseMs ?? 1000;
    this.maxMs = opts?.maxMs ?? 30_000;
    this.factor = opts?.factor ?? 2;
    this.jitter = opts?.jitter ?? 0.25;
  }

  /** Delay for the current failure count, without waiting. */
  delay(): number {
    const raw = Math.min(this.baseMs * Math.pow(this.factor, this.failures), this.maxMs);
    const jitterRange = raw * this.jitter;
    return Math.max(0, raw + (Math.random() * 2 - 1) * jitterRange);
  }

  /**
   * Count a failure and sleep for the computed delay.
   * Resolves early, without throwing, when `signal` aborts.
   */
  async wait(signal?: AbortSignal): Promise<void> {
    const ms = this.delay();
    this.failures++;
    if (signal?.aborted) return;
    await new Promise<void>((resolve) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
