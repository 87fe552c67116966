import logger from '../utils/logger';
import { delay } from '../utils/delays';
import { errorMessage } from '../utils/errors';
import { selectors } from '../utils/selectors';
import { DELAYS, LIMITS } from '../config/constants';
import { canonicalizePostUrl } from './urls';
import type { ScrapePage } from './types';

export interface CollectOptions {
  baseUrl: string;
  /** Scroll iterations before collecting; 0 disables incremental loading. */
  maxScrolls?: number;
  scrollSettleMs?: number;
  /** Stop scrolling once this many post links are on the page. */
  limit?: number;
  /** Prefix for log lines, usually the account handle. */
  label?: string;
}

const countPostLinks = async (page: ScrapePage): Promise<number> =>
  (await page.$$(selectors.anyPostLink)).length;

/**
 * Scroll the feed so lazily rendered posts get links. Stops when the link
 * count stops growing, reaches `limit`, or after `maxScrolls` iterations.
 */
export const loadMorePosts = async (
  page: ScrapePage,
  maxScrolls: number,
  scrollSettleMs: number,
  limit: number,
): Promise<number> => {
  let lastCount = -1;
  let scrolls = 0;

  for (; scrolls < maxScrolls; scrolls++) {
    const count = await countPostLinks(page);
    if (count === lastCount || count >= limit) {
      break;
    }
    lastCount = count;
    await page.mouse.wheel(0, LIMITS.SCROLL_STEP_PX);
    await delay(scrollSettleMs);
  }

  return scrolls;
};

const readHrefs = async (page: ScrapePage, pattern: string, label: string): Promise<string[]> => {
  const elements = await page.$$(pattern);
  const hrefs: string[] = [];
  for (const element of elements) {
    try {
      const href = await element.getAttribute('href');
      if (href) {
        hrefs.push(href);
      }
    } catch (error) {
      // Grid cells detach while the feed virtualizes
      logger.debug(`[Collector] @${label}: skipping link under ${pattern}: ${errorMessage(error)}`);
    }
  }
  return hrefs;
};

/**
 * Collect canonical post URLs from the account feed currently loaded in
 * `page`, in first-seen order. The first link pattern that matches anything
 * is used on its own; later, looser patterns are only a fallback.
 */
export const collectPostUrls = async (
  page: ScrapePage,
  {
    baseUrl,
    maxScrolls = 0,
    scrollSettleMs = DELAYS.SCROLL_SETTLE,
    limit = Number.POSITIVE_INFINITY,
    label = 'feed',
  }: CollectOptions,
): Promise<string[]> => {
  if (maxScrolls > 0) {
    try {
      const scrolls = await loadMorePosts(page, maxScrolls, scrollSettleMs, limit);
      logger.debug(`[Collector] @${label}: scrolled ${scrolls} time(s)`);
    } catch (error) {
      logger.warn(`[Collector] @${label}: scrolling failed, collecting what is loaded: ${errorMessage(error)}`);
    }
  }

  for (const pattern of selectors.postLinks) {
    let hrefs: string[];
    try {
      hrefs = await readHrefs(page, pattern, label);
    } catch (error) {
      logger.warn(`[Collector] @${label}: query ${pattern} failed: ${errorMessage(error)}`);
      continue;
    }

    if (!hrefs.length) {
      continue;
    }

    const seen = new Set<string>();
    const urls: string[] = [];
    for (const href of hrefs) {
      const canonical = canonicalizePostUrl(href, baseUrl);
      if (canonical && !seen.has(canonical)) {
        seen.add(canonical);
        urls.push(canonical);
      }
    }

    logger.info(`[Collector] @${label}: found ${urls.length} candidate post URLs using ${pattern}`);
    return urls;
  }

  logger.warn(`[Collector] @${label}: no post links found`);
  return [];
};
