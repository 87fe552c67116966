/**
 * Selector Resolution Chain
 *
 * The post page's markup is not a stable contract, so each field is read by an
 * ordered list of independent strategies. The first strategy that yields a
 * non-empty value wins; a strategy that throws simply counts as a miss.
 */

import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { selectors } from '../utils/selectors';
import { CAPTION } from '../config/constants';
import type { ScrapePage } from './types';

export type ExtractionField = 'caption' | 'date';

export interface ExtractionStrategy<T> {
  name: string;
  run: (page: ScrapePage) => Promise<T | null>;
}

export interface Resolution<T> {
  value: T;
  strategy: string;
}

const isEmpty = (value: unknown): boolean =>
  value === null || value === undefined || (typeof value === 'string' && value.trim() === '');

export const resolveField = async <T>(
  page: ScrapePage,
  strategies: readonly ExtractionStrategy<T>[],
  field: ExtractionField,
): Promise<Resolution<T> | null> => {
  for (const strategy of strategies) {
    try {
      const value = await strategy.run(page);
      if (value !== null && !isEmpty(value)) {
        logger.debug(`[Chain] ${field} resolved via ${strategy.name}`);
        return { value, strategy: strategy.name };
      }
    } catch (error) {
      logger.debug(`[Chain] ${field} strategy ${strategy.name} failed: ${errorMessage(error)}`);
    }
  }
  logger.debug(`[Chain] ${field} not found after ${strategies.length} strategies`);
  return null;
};

// ============================================
// Date
// ============================================

const ISO_WITH_OFFSET =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?(Z|[+-]\d{2}:?\d{2})$/;

/**
 * Parse an ISO-8601 timestamp that carries an explicit offset. Naive
 * timestamps and anything `Date` cannot read give null.
 */
export const parseIsoTimestamp = (raw: string | null | undefined): Date | null => {
  if (!raw) {
    return null;
  }
  const value = raw.trim();
  if (!ISO_WITH_OFFSET.test(value)) {
    return null;
  }
  const normalized = value.replace(/([+-]\d{2})(\d{2})$/, '$1:$2');
  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
};

const timeAttributeStrategy = (selector: string): ExtractionStrategy<Date> => ({
  name: selector,
  run: async (page) => {
    const element = await page.$(selector);
    if (!element) {
      return null;
    }
    const raw = await element.getAttribute('datetime');
    const parsed = parseIsoTimestamp(raw);
    if (!parsed && raw) {
      logger.debug(`[Chain] Unrecognized datetime value ${JSON.stringify(raw)} at ${selector}`);
    }
    return parsed;
  },
});

export const dateStrategies: readonly ExtractionStrategy<Date>[] =
  selectors.postDate.map(timeAttributeStrategy);

// ============================================
// Caption
// ============================================

const UI_WORDS_PATTERN = new RegExp(`\\b(${CAPTION.UI_WORDS.join('|')})\\b`, 'i');

/**
 * Heuristic de-noising for the generic text scan: a caption is longer than a
 * button label, shorter than a page dump, and free of interface words.
 */
export const isPlausibleCaption = (text: string): boolean => {
  const trimmed = text.trim();
  if (trimmed.length <= CAPTION.MIN_LENGTH || trimmed.length >= CAPTION.MAX_LENGTH) {
    return false;
  }
  return !UI_WORDS_PATTERN.test(trimmed);
};

const firstTextStrategy = (name: string, selector: string): ExtractionStrategy<string> => ({
  name,
  run: async (page) => {
    const element = await page.$(selector);
    if (!element) {
      return null;
    }
    return (await element.innerText()).trim();
  },
});

const textScanStrategy: ExtractionStrategy<string> = {
  name: 'text-scan',
  run: async (page) => {
    const elements = await page.$$(selectors.captionTextScan);
    for (const element of elements) {
      try {
        const text = (await element.innerText()).trim();
        if (isPlausibleCaption(text)) {
          return text;
        }
      } catch (error) {
        // Element may have detached from the DOM while scanning
        logger.debug(`[Chain] Skipping detached element: ${errorMessage(error)}`);
      }
    }
    return null;
  },
};

export const captionStrategies: readonly ExtractionStrategy<string>[] = [
  firstTextStrategy('structural-path', selectors.captionStructural),
  ...selectors.captionCandidates.map((selector) => firstTextStrategy(selector, selector)),
  textScanStrategy,
];
