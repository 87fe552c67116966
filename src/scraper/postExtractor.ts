import logger from '../utils/logger';
import { withRetries } from '../utils/retry';
import { NavigationFailedError, NavigationTimeoutError } from '../utils/errors';
import { DELAYS, LIMITS } from '../config/constants';
import { navigate } from './navigator';
import { captionStrategies, dateStrategies, resolveField } from './selectorChain';
import { createPostRecord } from './types';
import type { NavigateOptions } from './navigator';
import type { PostRecord, ScrapePage } from './types';

export interface ExtractOptions {
  /** Extra attempts after a timed-out navigation; attempts run 0..maxRetries. */
  maxRetries?: number;
  retryDelayMs?: number;
  navigation?: NavigateOptions;
}

export type PostInspection =
  | { status: 'recent'; post: PostRecord }
  | { status: 'stale'; datePosted: Date }
  | { status: 'undated' }
  | { status: 'unreachable' };

const loadPost = async (
  page: ScrapePage,
  url: string,
  { maxRetries = LIMITS.MAX_RETRIES, retryDelayMs = DELAYS.RETRY, navigation }: ExtractOptions,
): Promise<boolean> => {
  try {
    await withRetries(
      async () => {
        const outcome = await navigate(page, url, 'post', navigation);
        if (outcome === 'timeout') {
          throw new NavigationTimeoutError(url);
        }
        if (outcome === 'failed') {
          throw new NavigationFailedError(url);
        }
      },
      {
        attempts: maxRetries + 1,
        delayMs: retryDelayMs,
        factor: 1,
        shouldRetry: (error) => error instanceof NavigationTimeoutError,
        operationName: `[Extractor] Loading ${url}`,
      },
    );
    return true;
  } catch (error) {
    if (error instanceof NavigationTimeoutError) {
      logger.error(`[Extractor] Giving up on ${url} after ${maxRetries + 1} timed-out attempt(s)`);
    }
    return false;
  }
};

/**
 * Open one post and decide whether it belongs in the report. The cutoff is
 * applied right after the date is read so a stale post never pays for caption
 * extraction.
 */
export const inspectPost = async (
  page: ScrapePage,
  url: string,
  account: string,
  cutoffDate: Date,
  options: ExtractOptions = {},
): Promise<PostInspection> => {
  if (!(await loadPost(page, url, options))) {
    return { status: 'unreachable' };
  }

  const date = await resolveField(page, dateStrategies, 'date');
  if (!date) {
    logger.warn(`[Extractor] @${account}: no date for ${url}`);
    return { status: 'undated' };
  }

  if (date.value.getTime() < cutoffDate.getTime()) {
    logger.debug(`[Extractor] @${account}: ${url} is older than the cutoff (${date.value.toISOString()})`);
    return { status: 'stale', datePosted: date.value };
  }

  const caption = await resolveField(page, captionStrategies, 'caption');
  if (!caption) {
    logger.debug(`[Extractor] @${account}: no caption for ${url}`);
  }

  return {
    status: 'recent',
    post: createPostRecord({
      url,
      account,
      caption: caption ? caption.value : '',
      datePosted: date.value,
    }),
  };
};

export const extractPost = async (
  page: ScrapePage,
  url: string,
  account: string,
  cutoffDate: Date,
  options: ExtractOptions = {},
): Promise<PostRecord | null> => {
  const inspection = await inspectPost(page, url, account, cutoffDate, options);
  return inspection.status === 'recent' ? inspection.post : null;
};
