import { TransportError } from './errors';
import logger from './logger';

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  exponentialBackoff?: boolean;
  /** Errors this rejects are rethrown straight away. Defaults to retrying everything. */
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const {
    maxAttempts,
    delayMs,
    exponentialBackoff = true,
    shouldRetry = () => true,
    sleep: wait = sleep,
  } = options;

  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts || !shouldRetry(error)) {
        break;
      }

      const backoff = exponentialBackoff
        ? delayMs * Math.pow(2, attempt - 1)
        : delayMs;
      const delay = isRateLimitError(error) ? retryAfterMs(error) ?? backoff : backoff;

      logger.warn(`Retry attempt ${attempt}/${maxAttempts} after ${delay}ms`, {
        error: error instanceof Error ? error.message : String(error),
      });

      await wait(delay);
    }
  }

  throw lastError || new Error('Retry failed with unknown error');
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function isRateLimitError(error: unknown): boolean {
  return error instanceof TransportError && error.status === 429;
}

function retryAfterMs(error: unknown): number | undefined {
  return error instanceof TransportError ? error.details.retryAfterMs : undefined;
}

/**
 * Retry policy for POSTs that must not run twice: a rate limit, or a
 * connection that was never opened. Anything else may have reached the server.
 */
export function isResendableError(error: unknown): boolean {
  if (!(error instanceof TransportError)) {
    return false;
  }

  if (isRateLimitError(error)) {
    return true;
  }

  const { errorCode } = error.details;
  return errorCode === 'ECONNREFUSED' || errorCode === 'ENOTFOUND';
}
