/**
 * Position within one account's collected post URLs. Lives for a single
 * account run and is never persisted.
 */
export class AccountCursor {
  private position = 0;
  private readonly urls: readonly string[];

  constructor(urls: readonly string[], limit: number = urls.length) {
    this.urls = urls.slice(0, Math.max(0, limit));
  }

  get total(): number {
    return this.urls.length;
  }

  /** 1-based index of the URL most recently returned by `next()`. */
  get index(): number {
    return this.position;
  }

  hasNext(): boolean {
    return this.position < this.urls.length;
  }

  next(): string | null {
    if (!this.hasNext()) {
      return null;
    }
    const url = this.urls[this.position];
    this.position += 1;
    return url;
  }
}
