import type { ScrapePage } from '../scraper/types';

export type SelectorList = string | readonly string[];

const toArray = (input: SelectorList): string[] => {
  if (typeof input === 'string') {
    return [input];
  }
  return [...input];
};

// Absolute path of the caption span on a post page. Breaks whenever the
// markup shifts, which is why it is only the first of several strategies.
export const CAPTION_XPATH =
  '/html/body/div[1]/div/div/div[2]/div/div/div[1]/div[1]/div[1]/section/main/' +
  'div/div[1]/div/div[2]/div/div[2]/div/div[1]/div/div[2]/div/span/div/span';

export const selectors = {
  // Feed links, most specific first
  postLinks: ['a[href*="/p/"]', 'a[href*="/reel/"]', 'a[href]'],
  anyPostLink: 'a[href*="/p/"], a[href*="/reel/"]',
  postDate: ['article time[datetime]', 'main time[datetime]', 'time[datetime]'],
  captionStructural: `xpath=${CAPTION_XPATH}`,
  captionCandidates: [
    'article h1',
    'article section span[dir="auto"]',
    'div[role="dialog"] article span[dir="auto"]',
    'article h2',
  ],
  captionTextScan: 'span[dir="auto"], h1, div[dir="auto"]',
  consentButtons: [
    'button:has-text("Only allow essential")',
    'button:has-text("Allow all")',
    'button:has-text("Accept all")',
    'button:has-text("Accept")',
  ],
  loginUsername: 'input[name="username"]',
  loginPassword: 'input[name="password"]',
} as const;

export const findFirstHandle = async (page: ScrapePage, selectorList: SelectorList) => {
  for (const selector of toArray(selectorList)) {
    const handle = await page.$(selector);
    if (handle) {
      return { selector, handle };
    }
  }
  return { selector: null, handle: null };
};
