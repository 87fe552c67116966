/**
 * Centralized timeout, delay and limit constants
 */

// Browser automation timeouts (in milliseconds)
export const TIMEOUTS = {
  /** Default timeout for loading an account or post page */
  POST_LOAD: 20000,
  /** Lower bound accepted for a configured page load timeout */
  POST_LOAD_MIN: 1000,
  /** Click timeout when dismissing the consent dialog */
  CONSENT_CLICK: 1000,
} as const;

// Fixed delays (in milliseconds)
export const DELAYS = {
  /** Wait after a successful navigation so client-side rendering can fill the DOM */
  SETTLE: 1500,
  /** Wait before retrying a timed-out navigation */
  RETRY: 2000,
  /** Wait between two posts of the same account */
  BETWEEN_POSTS: 1000,
  /** Wait between two accounts */
  BETWEEN_ACCOUNTS: 2000,
  /** Wait after each feed scroll */
  SCROLL_SETTLE: 350,
} as const;

// Scraping limits
export const LIMITS = {
  /** Default posts inspected per account */
  MAX_POSTS_PER_ACCOUNT: 3,
  /** Default retries for a timed-out post navigation */
  MAX_RETRIES: 2,
  /** Safety cap on feed scroll iterations */
  MAX_SCROLLS: 10,
  /** Pixels scrolled per iteration */
  SCROLL_STEP_PX: 2000,
  /** Default look-back window for the CLI */
  DEFAULT_DAYS: 3,
} as const;

// Caption heuristics
export const CAPTION = {
  MIN_LENGTH: 10,
  MAX_LENGTH: 1000,
  /** Words that mark a text node as UI chrome rather than a caption */
  UI_WORDS: ['follow', 'like', 'comment', 'share', 'save', 'more'],
} as const;

export const DEFAULTS = {
  INSTAGRAM_URL: 'https://www.instagram.com',
  TIMEZONE: 'Europe/Madrid',
  OUTPUT_DIR: './reports',
} as const;
