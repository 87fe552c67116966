import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import logger from '../utils/logger';
import { BrowserConnectionError, errorMessage } from '../utils/errors';
import type { EnvConfig } from '../config/env';
import type { ScrapePage } from '../scraper/types';

export interface BrowserSession {
  page: ScrapePage;
  close: () => Promise<void>;
}

type SessionConfig = Pick<
  EnvConfig,
  'BROWSER_CDP_URL' | 'BROWSER_USER_DATA_DIR' | 'BROWSER_EXECUTABLE_PATH' | 'HEADLESS' | 'POST_LOAD_TIMEOUT_MS'
>;

/**
 * Safely close browser with error handling
 */
const safeClose = async (target: Browser | BrowserContext, label: string): Promise<void> => {
  try {
    await target.close();
    logger.debug(`[Browser] ${label} closed`);
  } catch (closeError) {
    logger.warn(`[Browser] ${label} close warning: ${errorMessage(closeError)}`);
  }
};

const firstPage = async (context: BrowserContext): Promise<Page> => {
  const [existing] = context.pages();
  return existing ?? context.newPage();
};

const connectOverCdp = async (endpoint: string): Promise<{ browser: Browser; page: Page }> => {
  let browser: Browser;
  try {
    browser = await chromium.connectOverCDP(endpoint);
  } catch (error) {
    if (errorMessage(error).includes('ECONNREFUSED')) {
      throw new BrowserConnectionError(
        `Failed to connect to the browser at ${endpoint}. Close all browser windows and start it again with remote debugging enabled.`,
        endpoint,
      );
    }
    throw error;
  }

  const [existingContext] = browser.contexts();
  const context = existingContext ?? (await browser.newContext());
  return { browser, page: await firstPage(context) };
};

/**
 * Obtain the single page the whole run drives. Prefers attaching to the user's
 * own logged-in browser; when that is not configured or cannot be reached,
 * launches Chromium, on a persistent profile when one is configured.
 */
export const openBrowserSession = async (config: SessionConfig): Promise<BrowserSession> => {
  if (config.BROWSER_CDP_URL) {
    logger.info(`[Browser] Connecting over CDP to ${config.BROWSER_CDP_URL}`);
    try {
      const { browser, page } = await connectOverCdp(config.BROWSER_CDP_URL);
      page.setDefaultNavigationTimeout(config.POST_LOAD_TIMEOUT_MS);
      return {
        page,
        // Closing a CDP-connected browser only detaches; the user's browser keeps running
        close: () => safeClose(browser, 'CDP connection'),
      };
    } catch (error) {
      logger.warn(`[Browser] Could not attach over CDP (${errorMessage(error)}); falling back to a launched browser.`);
    }
  }

  const launchOptions = {
    headless: config.HEADLESS,
    executablePath: config.BROWSER_EXECUTABLE_PATH,
  };

  if (config.BROWSER_USER_DATA_DIR) {
    logger.info(`[Browser] Launching persistent profile at ${config.BROWSER_USER_DATA_DIR}`);
    const context = await chromium.launchPersistentContext(config.BROWSER_USER_DATA_DIR, launchOptions);
    const page = await firstPage(context);
    page.setDefaultNavigationTimeout(config.POST_LOAD_TIMEOUT_MS);
    return { page, close: () => safeClose(context, 'Persistent context') };
  }

  logger.info(`[Browser] Launching Chromium (headless: ${config.HEADLESS})`);
  const browser = await chromium.launch(launchOptions);
  try {
    const context = await browser.newContext();
    const page = await context.newPage();
    page.setDefaultNavigationTimeout(config.POST_LOAD_TIMEOUT_MS);
    return { page, close: () => safeClose(browser, 'Browser') };
  } catch (error) {
    await safeClose(browser, 'Browser');
    throw error;
  }
};
