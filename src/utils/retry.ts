import logger from './logger';
import { delay } from './delays';

export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
  factor?: number;
  /** Return false to rethrow the error at once instead of retrying. */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
  operationName?: string;
}

/**
 * Retry an async operation. With the default `factor` of 1 the wait between
 * attempts is fixed; a larger factor backs off exponentially.
 */
export const withRetries = async <T>(
  fn: (attempt: number) => Promise<T>,
  {
    attempts = 3,
    delayMs = 2000,
    factor = 1,
    shouldRetry,
    onRetry,
    operationName,
  }: RetryOptions = {}
): Promise<T> => {
  let lastError: Error | null = null;
  let currentDelay = delayMs;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (attempt >= attempts) {
        break;
      }
      if (shouldRetry && !shouldRetry(lastError, attempt)) {
        break;
      }

      onRetry?.(lastError, attempt);
      const name = operationName ? `${operationName} ` : '';
      logger.warn(
        `${name}attempt ${attempt}/${attempts} failed: ${lastError.message}. Retrying in ${currentDelay}ms...`
      );
      await delay(currentDelay);
      currentDelay *= factor;
    }
  }

  if (lastError) {
    throw lastError;
  }

  // Only reachable with attempts < 1
  throw new Error(operationName || 'Operation failed after retries');
};
