/**
 * HTML report generation
 *
 * Turns the run's post records into a standalone HTML page, newest first.
 */

import fs from 'fs/promises';
import path from 'path';
import logger from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { cleanCaption } from './captionCleaner';
import {
  calendarDaysBetween,
  fileTimestamp,
  formatDate,
  formatDateTime,
  formatPostDate,
} from './dateFormat';
import type { PostRecord } from '../scraper/types';

export interface ReportPost {
  url: string;
  account: string;
  caption: string;
  date: string;
}

export interface ReportData {
  posts: ReportPost[];
  totalPosts: number;
  totalAccounts: number;
  generatedOn: string;
  dateRange: string;
  maxPostAge: number;
}

export interface ReportOptions {
  timeZone: string;
  now?: Date;
}

export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

export const buildReportData = (
  posts: readonly PostRecord[],
  cutoffDate: Date,
  generatedAt: Date,
  timeZone: string,
): ReportData => {
  const sorted = [...posts].sort((a, b) => b.datePosted.getTime() - a.datePosted.getTime());

  return {
    posts: sorted.map((post) => ({
      url: post.url,
      account: post.account,
      caption: cleanCaption(post.caption),
      date: formatPostDate(post.datePosted, timeZone),
    })),
    totalPosts: posts.length,
    totalAccounts: new Set(posts.map((post) => post.account)).size,
    generatedOn: formatDateTime(generatedAt, timeZone),
    dateRange: `${formatDate(cutoffDate, timeZone)} - ${formatDate(generatedAt, timeZone)}`,
    maxPostAge: Math.max(0, calendarDaysBetween(cutoffDate, generatedAt, timeZone)),
  };
};

const renderPost = (post: ReportPost): string => {
  const caption = post.caption
    ? escapeHtml(post.caption).replace(/\n/g, '<br>')
    : '<em>No caption</em>';

  return `
    <article class="post">
      <header>
        <span class="account">@${escapeHtml(post.account)}</span>
        <time>${escapeHtml(post.date)}</time>
      </header>
      <p class="caption">${caption}</p>
      <a class="link" href="${escapeHtml(post.url)}" target="_blank" rel="noopener noreferrer">View post</a>
    </article>`;
};

export const renderReportHtml = (data: ReportData): string => `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Instagram posts ${escapeHtml(data.dateRange)}</title>
  <style>
    body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; background: #f8fafc; margin: 0; }
    .container { max-width: 900px; margin: 0 auto; padding: 20px; }
    h1 { color: #1e293b; border-bottom: 2px solid #e2e8f0; padding-bottom: 10px; }
    .summary { display: flex; gap: 12px; flex-wrap: wrap; margin-bottom: 20px; }
    .stat { background: #fff; padding: 12px 16px; border-radius: 8px; }
    .stat-label { color: #64748b; font-size: 13px; }
    .stat-value { font-size: 20px; font-weight: bold; color: #1e293b; }
    .posts { display: grid; grid-template-columns: repeat(auto-fill, minmax(260px, 1fr)); gap: 16px; }
    .post { background: #fff; border-radius: 8px; padding: 16px; }
    .post header { display: flex; justify-content: space-between; font-size: 14px; }
    .account { font-weight: bold; color: #1e293b; }
    time { color: #64748b; }
    .caption { white-space: normal; }
    .footer { margin-top: 30px; padding-top: 20px; border-top: 1px solid #e2e8f0; font-size: 12px; color: #94a3b8; }
  </style>
</head>
<body>
  <div class="container">
    <h1>Recent Instagram posts</h1>
    <div class="summary">
      <div class="stat"><div class="stat-label">Posts</div><div class="stat-value">${data.totalPosts}</div></div>
      <div class="stat"><div class="stat-label">Accounts</div><div class="stat-value">${data.totalAccounts}</div></div>
      <div class="stat"><div class="stat-label">Date range</div><div class="stat-value">${escapeHtml(data.dateRange)}</div></div>
      <div class="stat"><div class="stat-label">Max post age (days)</div><div class="stat-value">${data.maxPostAge}</div></div>
    </div>
    <section class="posts">${data.posts.map(renderPost).join('')}
    </section>
    <div class="footer">Generated on ${escapeHtml(data.generatedOn)}</div>
  </div>
</body>
</html>
`;

/**
 * Write the report into `outputDir` and return its path. Returns null when
 * there is nothing to report or the file cannot be written.
 */
export const writeHtmlReport = async (
  posts: readonly PostRecord[],
  cutoffDate: Date,
  outputDir: string,
  { timeZone, now = new Date() }: ReportOptions,
): Promise<string | null> => {
  if (!posts.length) {
    logger.warn('[Report] No posts were provided, skipping report generation.');
    return null;
  }

  const html = renderReportHtml(buildReportData(posts, cutoffDate, now, timeZone));
  const reportPath = path.join(outputDir, `instagram_report_${fileTimestamp(now, timeZone)}.html`);

  try {
    await fs.mkdir(outputDir, { recursive: true });
    await fs.writeFile(reportPath, html, 'utf-8');
  } catch (error) {
    logger.error(`[Report] Failed to write HTML report to ${reportPath}: ${errorMessage(error)}`);
    return null;
  }

  logger.info(`[Report] Generated HTML report: ${reportPath}`);
  return reportPath;
};
