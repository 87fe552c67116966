/**
 * Shapes shared by the scraping pipeline.
 *
 * `ScrapePage` is the slice of a Playwright `Page` the pipeline touches. A real
 * page satisfies it structurally; tests hand in small fakes.
 */

export interface ScrapeElement {
  getAttribute(name: string): Promise<string | null>;
  innerText(): Promise<string>;
  click(options?: { timeout?: number }): Promise<void>;
}

export interface NavigationResponse {
  status(): number;
}

export interface ScrapePage {
  goto(
    url: string,
    options?: { waitUntil?: 'load' | 'domcontentloaded' | 'networkidle' | 'commit'; timeout?: number }
  ): Promise<NavigationResponse | null>;
  $(selector: string): Promise<ScrapeElement | null>;
  $$(selector: string): Promise<ScrapeElement[]>;
  mouse: {
    wheel(deltaX: number, deltaY: number): Promise<void>;
  };
}

export interface PostRecord {
  readonly url: string;
  readonly account: string;
  readonly caption: string;
  readonly datePosted: Date;
}

export const createPostRecord = (fields: PostRecord): PostRecord =>
  Object.freeze({
    url: fields.url,
    account: fields.account,
    caption: fields.caption,
    datePosted: new Date(fields.datePosted.getTime()),
  });

export interface AccountResult {
  account: string;
  posts: PostRecord[];
}
