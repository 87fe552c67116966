import logger from '../utils/logger';
import { delay } from '../utils/delays';
import { DELAYS, LIMITS } from '../config/constants';
import { AccountCursor } from './accountCursor';
import { isNavigationOk, navigate } from './navigator';
import { collectPostUrls } from './postUrlCollector';
import { extractPost } from './postExtractor';
import { accountFeedUrl } from './urls';
import type { ExtractOptions } from './postExtractor';
import type { NavigateOptions } from './navigator';
import type { PostRecord, ScrapePage } from './types';

export interface AccountOptions extends ExtractOptions {
  baseUrl: string;
  maxPostsPerAccount?: number;
  /** Feed scroll iterations before collecting links. */
  maxScrolls?: number;
  scrollSettleMs?: number;
  postDelayMs?: number;
  navigation?: NavigateOptions;
  /** Checked before each post; an in-flight post always completes. */
  signal?: AbortSignal;
}

/**
 * Collect the recent posts of one account in feed order.
 *
 * The feed is assumed newest first, so the first post that yields no record
 * ends the walk: everything after it is taken to be older still.
 */
export const processAccount = async (
  account: string,
  page: ScrapePage,
  cutoffDate: Date,
  options: AccountOptions,
): Promise<PostRecord[]> => {
  const {
    baseUrl,
    maxPostsPerAccount = LIMITS.MAX_POSTS_PER_ACCOUNT,
    maxScrolls = LIMITS.MAX_SCROLLS,
    scrollSettleMs,
    postDelayMs = DELAYS.BETWEEN_POSTS,
    navigation,
    signal,
  } = options;

  logger.info(`[Account] Processing @${account}`);

  const landing = await navigate(page, accountFeedUrl(baseUrl, account), 'account page', navigation);
  if (!isNavigationOk(landing)) {
    logger.error(`[Account] @${account}: could not open the account page, skipping`);
    return [];
  }

  const urls = await collectPostUrls(page, {
    baseUrl,
    maxScrolls,
    scrollSettleMs,
    limit: maxPostsPerAccount,
    label: account,
  });
  if (!urls.length) {
    logger.info(`[Account] @${account}: no post URLs, skipping`);
    return [];
  }

  const cursor = new AccountCursor(urls, maxPostsPerAccount);
  const posts: PostRecord[] = [];

  while (cursor.hasNext()) {
    if (signal?.aborted) {
      logger.info(`[Account] @${account}: cancelled after ${posts.length} post(s)`);
      break;
    }

    if (cursor.index > 0 && postDelayMs > 0) {
      await delay(postDelayMs);
    }

    const url = cursor.next();
    if (url === null) {
      break;
    }
    logger.debug(`[Account] @${account}: post ${cursor.index}/${cursor.total}`);

    const post = await extractPost(page, url, account, cutoffDate, options);
    if (!post) {
      logger.debug(`[Account] @${account}: stopping at post ${cursor.index}, no recent record`);
      break;
    }
    posts.push(post);
  }

  logger.info(`[Account] @${account}: ${posts.length} recent post(s) from ${urls.length} URL(s)`);
  return posts;
};
