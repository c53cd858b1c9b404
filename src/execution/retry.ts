// Single retry policy for native invocations: bounded attempts with a delay
// that starts at baseDelayMs and doubles after every failed attempt.

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly sleep?: Sleep;
}

export interface RetryOutcome<T> {
  readonly value: T;
  readonly attempts: number;
  readonly succeeded: boolean;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  private readonly sleep: Sleep;

  constructor(options: RetryOptions) {
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Delay before the attempt that follows failed attempt number `attempt` (1-based). */
  delayAfter(attempt: number): number {
    return this.baseDelayMs * 2 ** (attempt - 1);
  }

  /**
   * Run `attempt` until `isSuccess` accepts its value or attempts run out.
   * Returns the last value either way; the caller decides what failure means.
   */
  async run<T>(attempt: (n: number) => Promise<T>, isSuccess: (value: T) => boolean): Promise<RetryOutcome<T>> {
    let n = 1;
    for (;;) {
      const value = await attempt(n);
      if (isSuccess(value)) return { value, attempts: n, succeeded: true };
      if (n >= this.maxAttempts) return { value, attempts: n, succeeded: false };
      await this.sleep(this.delayAfter(n));
      n++;
    }
  }
}
