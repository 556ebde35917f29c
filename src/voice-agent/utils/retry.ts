/**
 * Timeout and Retry Utilities
 *
 * Wall-clock timeouts for oracle requests and exponential backoff for the
 * STT transport. Timeouts are per call and never cascade.
 */

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of attempts (default: 3) */
  maxAttempts: number;
  /** Delay before the second attempt in milliseconds (default: 500) */
  initialDelayMs: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier: number;
  /** Maximum delay between attempts in milliseconds (default: 4000) */
  maxDelayMs: number;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Decides whether an error is worth another attempt */
  isRetryable?: (error: Error) => boolean;
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | { success: true; result: T; attempts: number; totalTimeMs: number }
  | { success: false; error: Error; attempts: number; totalTimeMs: number };

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 4000,
};

/**
 * Raised by withTimeout when the wrapped call does not settle in time
 */
export class TimeoutError extends Error {
  public readonly timeoutMs: number;
  public readonly serviceName: string;

  constructor(serviceName: string, timeoutMs: number) {
    super(`${serviceName} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
    this.serviceName = serviceName;
  }
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

/**
 * Run `fn` with a deadline.
 *
 * The signal handed to `fn` is aborted when the deadline passes, so fetch
 * calls stop instead of lingering in the background.
 *
 * @throws TimeoutError if the operation does not settle within `timeoutMs`
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  serviceName: string = "Operation"
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(serviceName, timeoutMs));
    }, timeoutMs);

    fn(controller.signal)
      .then((result) => {
        clearTimeout(timeoutId);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

/**
 * Retries connection-level failures and 5xx responses
 */
export function isNetworkRetryable(error: Error): boolean {
  const message = error.message.toLowerCase();

  return (
    message.includes("fetch failed") ||
    message.includes("econnrefused") ||
    message.includes("econnreset") ||
    message.includes("etimedout") ||
    message.includes("socket") ||
    /http 5\d\d/.test(message)
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before attempt `attempt + 1`
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt - 1);
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Execute an async function with exponential backoff retry
 *
 * @example
 * ```ts
 * const result = await withRetry(() => postAudio(wav), {
 *   maxAttempts: 3,
 *   onRetry: (attempt, error, delay) => console.warn(`retry ${attempt} in ${delay}ms`),
 * });
 * ```
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<RetryResult<T>> {
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const isRetryable = fullConfig.isRetryable ?? isNetworkRetryable;
  const startTime = Date.now();
  let lastError = new Error("No attempts made");
  let attempt = 0;

  while (attempt < fullConfig.maxAttempts) {
    attempt++;
    try {
      const result = await fn();
      return { success: true, result, attempts: attempt, totalTimeMs: Date.now() - startTime };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt >= fullConfig.maxAttempts || !isRetryable(lastError)) {
        break;
      }

      const delayMs = calculateBackoffDelay(attempt, fullConfig);
      fullConfig.onRetry?.(attempt, lastError, delayMs);
      await sleep(delayMs);
    }
  }

  return { success: false, error: lastError, attempts: attempt, totalTimeMs: Date.now() - startTime };
}

export function formatRetryMessage(
  attempt: number,
  maxAttempts: number,
  serviceName: string
): string {
  if (attempt === maxAttempts) {
    return `${serviceName} unreachable after ${maxAttempts} attempts`;
  }
  return `${serviceName} unreachable, retrying... (${attempt}/${maxAttempts})`;
}

export function formatTimeoutMessage(serviceName: string, timeoutMs: number): string {
  const seconds = Math.round(timeoutMs / 1000);
  return `${serviceName} timed out after ${seconds}s`;
}
