import { describe, it, expect, vi, beforeEach } from 'vitest';
import { errors } from 'playwright';

vi.mock('../src/utils/logger', () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../src/utils/delays', () => ({
  delay: vi.fn().mockResolvedValue(undefined),
}));

import { extractPost, inspectPost } from '../src/scraper/postExtractor';
import { selectors } from '../src/utils/selectors';
import { delay } from '../src/utils/delays';
import { createFakePage, fakeElement } from './helpers/fakePage';

const POST_URL = 'https://www.instagram.com/p/Cabc123';
const CUTOFF = new Date('2026-10-16T00:00:00.000Z');
const OPTIONS = { maxRetries: 2, retryDelayMs: 500, navigation: { timeoutMs: 1000, settleMs: 0 } };

const timeout = () => new errors.TimeoutError('page.goto: Timeout 1000ms exceeded.');

const postPage = (datetime: string | null, caption: string) =>
  createFakePage({
    elements: {
      ...(datetime ? { 'article time[datetime]': [fakeElement({ attrs: { datetime } })] } : {}),
      'article h1': [fakeElement({ text: caption })],
    },
  });

describe('extractPost()', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should build a record from a recent post', async () => {
    const page = postPage('2026-10-18T09:30:00.000Z', 'Great concert tonight!');

    const post = await extractPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS);

    expect(post).toEqual({
      url: POST_URL,
      account: 'test_account',
      caption: 'Great concert tonight!',
      datePosted: new Date('2026-10-18T09:30:00.000Z'),
    });
    expect(page.goto).toHaveBeenCalledTimes(1);
  });

  it('should return a frozen record', async () => {
    const page = postPage('2026-10-18T09:30:00.000Z', 'Great concert tonight!');

    const post = await extractPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS);

    expect(Object.isFrozen(post)).toBe(true);
  });

  it('should accept a post dated exactly at the cutoff', async () => {
    const page = postPage('2026-10-16T00:00:00Z', 'Right on the boundary');

    const post = await extractPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS);

    expect(post?.datePosted.getTime()).toBe(CUTOFF.getTime());
  });

  it('should retry timed-out navigations and succeed on the third attempt', async () => {
    const page = postPage('2026-10-18T09:30:00.000Z', 'Great concert tonight!');
    page.goto.mockRejectedValueOnce(timeout()).mockRejectedValueOnce(timeout());

    const post = await extractPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS);

    expect(post?.caption).toBe('Great concert tonight!');
    expect(page.goto).toHaveBeenCalledTimes(3);
    expect(delay).toHaveBeenCalledWith(500);
    expect(vi.mocked(delay).mock.calls.filter(([ms]) => ms === 500)).toHaveLength(2);
  });

  it('should give up after maxRetries + 1 timed-out attempts', async () => {
    const page = postPage('2026-10-18T09:30:00.000Z', 'Great concert tonight!');
    page.goto.mockRejectedValue(timeout());

    const post = await extractPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS);

    expect(post).toBeNull();
    expect(page.goto).toHaveBeenCalledTimes(3);
  });

  it('should not retry other navigation errors', async () => {
    const page = postPage('2026-10-18T09:30:00.000Z', 'Great concert tonight!');
    page.goto.mockRejectedValueOnce(new Error('net::ERR_CONNECTION_RESET'));

    const post = await extractPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS);

    expect(post).toBeNull();
    expect(page.goto).toHaveBeenCalledTimes(1);
    expect(delay).not.toHaveBeenCalledWith(500);
  });

  it('should not retry at all with maxRetries = 0', async () => {
    const page = postPage('2026-10-18T09:30:00.000Z', 'Great concert tonight!');
    page.goto.mockRejectedValueOnce(timeout());

    const post = await extractPost(page, POST_URL, 'test_account', CUTOFF, { ...OPTIONS, maxRetries: 0 });

    expect(post).toBeNull();
    expect(page.goto).toHaveBeenCalledTimes(1);
  });

  it('should return null for a post older than the cutoff regardless of caption', async () => {
    const page = postPage('2026-10-15T23:59:59Z', 'A perfectly good caption');

    const post = await extractPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS);

    expect(post).toBeNull();
  });

  it('should keep an empty caption as a valid record', async () => {
    const page = postPage('2026-10-18T09:30:00.000Z', '');

    const post = await extractPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS);

    expect(post?.caption).toBe('');
    expect(post?.url).toBe(POST_URL);
  });
});

describe('inspectPost()', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should report an unreachable post', async () => {
    const page = postPage('2026-10-18T09:30:00.000Z', 'caption');
    page.goto.mockRejectedValueOnce(new Error('net::ERR_ABORTED'));

    await expect(inspectPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS)).resolves.toEqual({
      status: 'unreachable',
    });
  });

  it('should report a post without a date', async () => {
    const page = postPage(null, 'caption without a date');

    await expect(inspectPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS)).resolves.toEqual({
      status: 'undated',
    });
  });

  it('should report a stale post without reading its caption', async () => {
    const page = postPage('2026-10-01T08:00:00.000Z', 'An old caption');

    const inspection = await inspectPost(page, POST_URL, 'test_account', CUTOFF, OPTIONS);

    expect(inspection).toEqual({ status: 'stale', datePosted: new Date('2026-10-01T08:00:00.000Z') });
    expect(page.$).not.toHaveBeenCalledWith(selectors.captionStructural);
    expect(page.$).not.toHaveBeenCalledWith('article h1');
  });
});
