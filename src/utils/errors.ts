import { errors } from 'playwright';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class BrowserConnectionError extends Error {
  constructor(message: string, readonly endpoint?: string) {
    super(message);
    this.name = 'BrowserConnectionError';
  }
}

/**
 * Raised by the extractor's retry loop so that only timeouts are retried.
 */
export class NavigationTimeoutError extends Error {
  constructor(readonly url: string) {
    super(`Navigation to ${url} timed out`);
    this.name = 'NavigationTimeoutError';
  }
}

export class NavigationFailedError extends Error {
  constructor(readonly url: string) {
    super(`Navigation to ${url} failed`);
    this.name = 'NavigationFailedError';
  }
}

export const isTimeoutError = (error: unknown): boolean =>
  error instanceof errors.TimeoutError || (error instanceof Error && error.name === 'TimeoutError');

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
