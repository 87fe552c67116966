import logger from '../utils/logger';
import { delay } from '../utils/delays';
import { errorMessage, isTimeoutError } from '../utils/errors';
import { findFirstHandle, selectors } from '../utils/selectors';
import { DELAYS, TIMEOUTS } from '../config/constants';
import type { ScrapePage } from './types';

/**
 * `timeout` is retryable at the caller's discretion; `failed` is not.
 */
export type NavigationOutcome = 'ok' | 'timeout' | 'failed';

export interface NavigateOptions {
  timeoutMs?: number;
  settleMs?: number;
}

export const isNavigationOk = (outcome: NavigationOutcome): boolean => outcome === 'ok';

const dismissConsentIfPresent = async (page: ScrapePage): Promise<void> => {
  try {
    const { selector, handle } = await findFirstHandle(page, selectors.consentButtons);
    if (handle) {
      await handle.click({ timeout: TIMEOUTS.CONSENT_CLICK });
      logger.debug(`[Navigator] Dismissed consent dialog via ${selector}`);
    }
  } catch (error) {
    // The dialog is optional; a failed click leaves the page usable
    logger.debug(`[Navigator] Consent dismissal skipped: ${errorMessage(error)}`);
  }
};

const isLoginWall = async (page: ScrapePage): Promise<boolean> => {
  try {
    const [username, password] = await Promise.all([
      page.$(selectors.loginUsername),
      page.$(selectors.loginPassword),
    ]);
    return Boolean(username && password);
  } catch (error) {
    logger.debug(`[Navigator] Login wall check failed: ${errorMessage(error)}`);
    return false;
  }
};

/**
 * Load `url` in the shared page and wait a fixed settle delay so client-side
 * rendering can populate the DOM. `purpose` only labels the log lines.
 */
export const navigate = async (
  page: ScrapePage,
  url: string,
  purpose: string,
  { timeoutMs = TIMEOUTS.POST_LOAD, settleMs = DELAYS.SETTLE }: NavigateOptions = {}
): Promise<NavigationOutcome> => {
  try {
    const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
    if (response && response.status() >= 400) {
      logger.warn(`[Navigator] ${purpose} returned HTTP ${response.status()} at ${url}`);
    }
  } catch (error) {
    if (isTimeoutError(error)) {
      logger.warn(`[Navigator] Timed out after ${timeoutMs}ms loading ${purpose} at ${url}`);
      return 'timeout';
    }
    logger.error(`[Navigator] Failed to load ${purpose} at ${url}: ${errorMessage(error)}`);
    return 'failed';
  }

  await dismissConsentIfPresent(page);
  if (await isLoginWall(page)) {
    logger.error('[Navigator] Login page detected; the browser session is not authenticated.');
    return 'failed';
  }

  await delay(settleMs);
  return 'ok';
};
