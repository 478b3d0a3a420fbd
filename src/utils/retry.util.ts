// Retry utility with exponential backoff and jitter

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;      // milliseconds
  maxDelay: number;       // milliseconds
  jitterFactor: number;   // 0-1 (e.g., 0.3 = 30% jitter)
}

export interface RetryControls {
  /** Stops further attempts and interrupts a pending backoff. */
  signal?: AbortSignal;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /**
   * Delay hint carried by the error itself, such as a Retry-After header.
   * A hint longer than `maxDelay` ends the retries.
   */
  delayHint?: (error: Error) => number | undefined;
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

export class RetryAbortedError extends Error {
  constructor(public readonly attempts: number, public readonly lastError?: Error) {
    super(`Retry aborted after ${attempts} attempt(s)`);
    this.name = 'RetryAbortedError';
  }
}

export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelay * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelay);

  // Add jitter: randomize ±jitterFactor
  const jitterRange = cappedDelay * options.jitterFactor;
  const jitter = (Math.random() - 0.5) * 2 * jitterRange;

  return Math.max(0, cappedDelay + jitter);
}

/** Resolves after `ms`, or rejects with the signal's reason once it aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  isRetryable: (error: Error) => boolean,
  controls: RetryControls = {}
): Promise<T> {
  const { signal, onRetry, delayHint } = controls;
  let lastError: Error | undefined;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    if (signal?.aborted) {
      throw new RetryAbortedError(attempt, lastError);
    }

    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      // Don't retry non-retryable errors
      if (!isRetryable(lastError)) {
        throw lastError;
      }

      // Don't delay after last attempt
      if (attempt < options.maxRetries) {
        const hinted = delayHint?.(lastError);
        if (hinted !== undefined && hinted > options.maxDelay) {
          throw new RetryExhaustedError(
            `Retry delay of ${hinted}ms exceeds the ${options.maxDelay}ms ceiling`,
            attempt + 1,
            lastError
          );
        }

        const delay = hinted ?? calculateDelay(attempt, options);
        onRetry?.(lastError, attempt + 1, delay);
        try {
          await sleep(delay, signal);
        } catch {
          throw new RetryAbortedError(attempt + 1, lastError);
        }
      }
    }
  }

  throw new RetryExhaustedError(
    `Operation failed after ${options.maxRetries + 1} attempts`,
    options.maxRetries + 1,
    lastError ?? new Error('Operation was never attempted')
  );
}
