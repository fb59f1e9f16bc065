export interface RetryPolicyOptions {
  maxAttempts: number;
  /** Delay before attempt n+1 is backoffMs[n-1]; the last entry repeats. */
  backoffMs: ReadonlyArray<number>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RetryExecuteOptions {
  isRetryable?: (error: unknown) => boolean;
  signal?: AbortSignal;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number; aborted: boolean };

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly backoffMs: ReadonlyArray<number>;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    this.backoffMs = options.backoffMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  delayFor(attempt: number): number {
    if (this.backoffMs.length === 0) {
      return 0;
    }
    const index = Math.min(attempt - 1, this.backoffMs.length - 1);
    return Math.max(0, this.backoffMs[Math.max(0, index)] ?? 0);
  }

  async execute<T>(fn: (attempt: number) => Promise<T>, options: RetryExecuteOptions = {}): Promise<RetryOutcome<T>> {
    const isRetryable = options.isRetryable ?? (() => true);
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      if (options.signal?.aborted) {
        return { ok: false, error: lastError, attempts: attempt - 1, aborted: true };
      }
      try {
        const value = await fn(attempt);
        return { ok: true, value, attempts: attempt };
      } catch (error) {
        lastError = error;
        if (attempt >= this.maxAttempts || !isRetryable(error)) {
          return { ok: false, error, attempts: attempt, aborted: false };
        }
        const delayMs = this.delayFor(attempt);
        options.onRetry?.({ attempt, delayMs, error });
        if (delayMs > 0) {
          await this.sleep(delayMs, options.signal);
        }
      }
    }

    return { ok: false, error: lastError, attempts: this.maxAttempts, aborted: false };
  }
}

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
