/**
 * Tests for selector lists and lookup helpers
 */

import { describe, it, expect } from 'vitest';
import { CAPTION_XPATH, findFirstHandle, selectors } from '../src/utils/selectors';
import { createFakePage, fakeElement } from './helpers/fakePage';

describe('selectors object', () => {
  it('should order post link patterns from most to least specific', () => {
    expect(selectors.postLinks).toEqual(['a[href*="/p/"]', 'a[href*="/reel/"]', 'a[href]']);
  });

  it('should scope date selectors from article outward', () => {
    expect(selectors.postDate[0]).toBe('article time[datetime]');
    expect(selectors.postDate[selectors.postDate.length - 1]).toBe('time[datetime]');
  });

  it('should prefix the structural caption path for the xpath engine', () => {
    expect(selectors.captionStructural).toBe(`xpath=${CAPTION_XPATH}`);
    expect(CAPTION_XPATH.startsWith('/html/body/')).toBe(true);
  });

  it('should try the most restrictive consent button first', () => {
    expect(selectors.consentButtons[0]).toBe('button:has-text("Only allow essential")');
  });
});

describe('findFirstHandle()', () => {
  it('should return the first selector that matches', async () => {
    const accept = fakeElement({ text: 'Accept' });
    const page = createFakePage({
      elements: { 'button:has-text("Accept all")': [accept] },
    });

    const result = await findFirstHandle(page, selectors.consentButtons);

    expect(result.selector).toBe('button:has-text("Accept all")');
    expect(result.handle).toBe(accept);
    expect(page.$).toHaveBeenCalledTimes(3);
  });

  it('should accept a single selector string', async () => {
    const input = fakeElement();
    const page = createFakePage({ elements: { [selectors.loginUsername]: [input] } });

    const result = await findFirstHandle(page, selectors.loginUsername);

    expect(result.handle).toBe(input);
  });

  it('should return nulls when nothing matches', async () => {
    const result = await findFirstHandle(createFakePage(), selectors.consentButtons);

    expect(result).toEqual({ selector: null, handle: null });
  });
});
