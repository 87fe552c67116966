import logger from '../utils/logger';
import { delay } from '../utils/delays';
import { errorMessage } from '../utils/errors';
import { DELAYS } from '../config/constants';
import { processAccount } from './accountProcessor';
import type { AccountOptions } from './accountProcessor';
import type { AccountResult, ScrapePage } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RunOptions extends AccountOptions {
  accountDelayMs?: number;
}

/**
 * Earliest timestamp a post may carry to be reported. Computed once per run so
 * every account is judged against the same instant.
 */
export const computeCutoffDate = (days: number, now: Date = new Date()): Date => {
  if (!Number.isInteger(days) || days < 0) {
    throw new RangeError(`days must be a non-negative integer, got ${days}`);
  }
  return new Date(now.getTime() - days * DAY_MS);
};

/**
 * Process the accounts one after another on the shared page. One account's
 * failure never stops the run; it is logged and reported as empty.
 */
export const scrapeAccounts = async (
  page: ScrapePage,
  accounts: readonly string[],
  cutoffDate: Date,
  options: RunOptions,
): Promise<AccountResult[]> => {
  const { accountDelayMs = DELAYS.BETWEEN_ACCOUNTS, signal } = options;
  const results: AccountResult[] = [];

  logger.info(`[Runner] Fetching posts since ${cutoffDate.toISOString()} from ${accounts.length} account(s)`);

  for (const [index, account] of accounts.entries()) {
    if (signal?.aborted) {
      logger.warn(`[Runner] Cancelled before @${account}; ${accounts.length - index} account(s) not processed`);
      break;
    }

    if (index > 0 && accountDelayMs > 0) {
      await delay(accountDelayMs);
    }

    logger.info(`[Runner] [${index + 1}/${accounts.length}] @${account}`);
    let posts: AccountResult['posts'] = [];
    try {
      posts = await processAccount(account, page, cutoffDate, options);
    } catch (error) {
      logger.error(`[Runner] @${account} failed unexpectedly: ${errorMessage(error)}`);
    }
    results.push({ account, posts });
  }

  const withPosts = results.filter((result) => result.posts.length > 0).length;
  const total = results.reduce((sum, result) => sum + result.posts.length, 0);
  logger.info(`[Runner] Completed: ${results.length} account(s) processed, ${withPosts} with posts, ${total} post(s) total`);

  return results;
};
