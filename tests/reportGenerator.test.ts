import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';

vi.mock('../src/utils/logger', () => ({
  default: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import {
  buildReportData,
  escapeHtml,
  renderReportHtml,
  writeHtmlReport,
} from '../src/report/reportGenerator';
import type { ReportData } from '../src/report/reportGenerator';
import { createPostRecord } from '../src/scraper/types';

const BASE = 'https://www.instagram.com';
const CUTOFF = new Date('2026-10-16T12:00:00.000Z');
const NOW = new Date('2026-10-19T12:00:00.000Z');

const posts = [
  createPostRecord({
    url: `${BASE}/p/AAA`,
    account: 'alpha',
    caption: 'Oldest post here #old',
    datePosted: new Date('2026-10-17T08:00:00.000Z'),
  }),
  createPostRecord({
    url: `${BASE}/p/BBB`,
    account: 'beta',
    caption: 'Newest post 🎉',
    datePosted: new Date('2026-10-18T20:15:00.000Z'),
  }),
  createPostRecord({
    url: `${BASE}/reel/CCC`,
    account: 'alpha',
    caption: '',
    datePosted: new Date('2026-10-18T09:00:00.000Z'),
  }),
];

describe('buildReportData()', () => {
  it('should sort newest first and summarise the run', () => {
    const data = buildReportData(posts, CUTOFF, NOW, 'UTC');

    expect(data.posts).toEqual([
      { url: `${BASE}/p/BBB`, account: 'beta', caption: 'Newest post', date: '2026-10-18 20:15' },
      { url: `${BASE}/reel/CCC`, account: 'alpha', caption: '', date: '2026-10-18 09:00' },
      { url: `${BASE}/p/AAA`, account: 'alpha', caption: 'Oldest post here', date: '2026-10-17 08:00' },
    ]);
    expect(data.totalPosts).toBe(3);
    expect(data.totalAccounts).toBe(2);
    expect(data.generatedOn).toBe('19-10-2026 12:00:00');
    expect(data.dateRange).toBe('16-10-2026 - 19-10-2026');
    expect(data.maxPostAge).toBe(3);
  });

  it('should not reorder the input', () => {
    buildReportData(posts, CUTOFF, NOW, 'UTC');
    expect(posts[0].url).toBe(`${BASE}/p/AAA`);
  });
});

describe('renderReportHtml()', () => {
  const data: ReportData = {
    posts: [
      { url: `${BASE}/p/X?a="1"`, account: 'fish<shop>', caption: 'Fish & chips <b>\nsecond line', date: '2026-10-18 09:00' },
      { url: `${BASE}/p/Y`, account: 'empty', caption: '', date: '2026-10-17 09:00' },
    ],
    totalPosts: 2,
    totalAccounts: 2,
    generatedOn: '19-10-2026 12:00:00',
    dateRange: '16-10-2026 - 19-10-2026',
    maxPostAge: 3,
  };

  it('should escape captions and keep line breaks', () => {
    const html = renderReportHtml(data);

    expect(html).toContain('<p class="caption">Fish &amp; chips &lt;b&gt;<br>second line</p>');
    expect(html).toContain('<span class="account">@fish&lt;shop&gt;</span>');
    expect(html).toContain(`href="${BASE}/p/X?a=&quot;1&quot;"`);
  });

  it('should mark posts without a caption', () => {
    expect(renderReportHtml(data)).toContain('<p class="caption"><em>No caption</em></p>');
  });

  it('should render the summary figures', () => {
    const html = renderReportHtml(data);

    expect(html).toContain('<title>Instagram posts 16-10-2026 - 19-10-2026</title>');
    expect(html).toContain('<div class="footer">Generated on 19-10-2026 12:00:00</div>');
  });
});

describe('escapeHtml()', () => {
  it('should escape every markup character', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;',
    );
  });
});

describe('writeHtmlReport()', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ig-report-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write a timestamped report into a new directory', async () => {
    const outputDir = path.join(tempDir, 'nested', 'reports');

    const reportPath = await writeHtmlReport(posts, CUTOFF, outputDir, { timeZone: 'UTC', now: NOW });

    expect(reportPath).toBe(path.join(outputDir, 'instagram_report_2026-10-19_12-00-00.html'));
    const html = await fs.readFile(path.join(outputDir, 'instagram_report_2026-10-19_12-00-00.html'), 'utf-8');
    expect(html).toContain('<span class="account">@beta</span>');
    expect(html).toContain('<p class="caption">Newest post</p>');
  });

  it('should return null when there are no posts', async () => {
    const reportPath = await writeHtmlReport([], CUTOFF, tempDir, { timeZone: 'UTC', now: NOW });

    expect(reportPath).toBeNull();
    expect(await fs.readdir(tempDir)).toEqual([]);
  });

  it('should return null when the directory cannot be created', async () => {
    const blocker = path.join(tempDir, 'not-a-dir');
    await fs.writeFile(blocker, 'x');

    const reportPath = await writeHtmlReport(posts, CUTOFF, blocker, { timeZone: 'UTC', now: NOW });

    expect(reportPath).toBeNull();
  });
});
