/**
 * Retry with exponential backoff for store calls
 *
 * Permanent errors (bad records, constraint violations) fail at once;
 * transient ones (timeouts, dropped connections, 5xx) are retried.
 */

export class PermanentError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'PermanentError';
  }
}

export class TransientError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'TransientError';
  }
}

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number;
  /** Initial delay in ms (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Custom function to determine if error is retryable */
  shouldRetry?: (error: Error) => boolean;
  /** Callback called before each retry attempt */
  onRetry?: (error: Error, attempt: number, delay: number) => void;
}

const TRANSIENT_PATTERNS = [
  'timeout',
  'econnreset',
  'econnrefused',
  'etimedout',
  'fetch failed',
  'network',
  'rate limit',
  'too many requests',
  'service unavailable',
  '503',
  '429',
  '502',
  '504'
];

export function isTransientError(error: Error): boolean {
  if (error instanceof PermanentError) return false;
  if (error instanceof TransientError) return true;

  const message = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some(pattern => message.includes(pattern));
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  shouldRetry: isTransientError,
  onRetry: () => {}
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Execute a function with retry logic
 *
 * @throws Last error if all attempts fail
 *
 * @example
 * await retry(() => db.insertIntervals(batch), {
 *   maxAttempts: 5,
 *   onRetry: (error, attempt) => console.log(`Retry ${attempt}: ${error.message}`)
 * });
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const lastError = toError(error);

      if (!config.shouldRetry(lastError) || attempt >= config.maxAttempts) {
        throw lastError;
      }

      const delay = Math.min(
        config.initialDelay * Math.pow(config.backoffMultiplier, attempt - 1),
        config.maxDelay
      );

      config.onRetry(lastError, attempt, delay);

      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}
