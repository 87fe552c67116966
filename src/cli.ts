#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Usage: ig-recent-posts [--days N] [--accounts a,b ...] [--output DIR]
 *                        [--log-dir DIR] [--max-posts N] [--headless]
 */

import { parseArgs } from 'util';
import logger, { enableFileLogging, setLogLevel } from './utils/logger';
import { ConfigError, errorMessage } from './utils/errors';
import { getEnvConfig } from './config/env';
import { cliArgsSchema, formatIssues } from './validation/schemas';
import { openBrowserSession } from './browser/session';
import { computeCutoffDate, scrapeAccounts } from './scraper/runner';
import { writeHtmlReport } from './report/reportGenerator';
import type { CliArgs } from './validation/schemas';
import type { AccountResult } from './scraper/types';

export const USAGE = `Fetch recent Instagram posts and generate an HTML report.

Options:
  -d, --days <n>          Number of days back to fetch posts from (default: 3)
  -a, --accounts <list>   Accounts to fetch, comma separated or repeated (default: configured accounts)
  -o, --output <dir>      Output directory for reports (default: OUTPUT_DIR)
      --log-dir <dir>     Directory for log files (default: LOG_DIR)
      --max-posts <n>     Posts inspected per account (default: MAX_POSTS_PER_ACCOUNT)
      --headless          Launch the browser without a window
  -h, --help              Show this help
`;

const cliOptions = {
  days: { type: 'string', short: 'd' },
  accounts: { type: 'string', short: 'a', multiple: true },
  output: { type: 'string', short: 'o' },
  'log-dir': { type: 'string' },
  'max-posts': { type: 'string' },
  headless: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

const readArgs = (argv: string[]) => parseArgs({ args: argv, options: cliOptions, allowPositionals: true });

export const parseCliArgs = (argv: string[]): CliArgs => {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (error) {
    throw new ConfigError(errorMessage(error));
  }

  const { values, positionals } = parsed;
  // `--accounts a b c` leaves b and c as positionals
  const accounts = [...(values.accounts ?? []), ...positionals]
    .flatMap((value) => value.split(','))
    .map((value) => value.trim())
    .filter(Boolean);

  const result = cliArgsSchema.safeParse({
    days: values.days,
    accounts: accounts.length ? accounts : undefined,
    output: values.output,
    logDir: values['log-dir'],
    maxPosts: values['max-posts'],
    headless: values.headless ?? false,
    help: values.help ?? false,
  });

  if (!result.success) {
    throw new ConfigError(`Invalid arguments:\n${formatIssues(result.error)}`);
  }
  return result.data;
};

export const main = async (argv: string[] = process.argv.slice(2)): Promise<number> => {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn('Interrupt received; finishing the current post before stopping.');
    controller.abort();
  };

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      process.stdout.write(USAGE);
      return 0;
    }

    const config = getEnvConfig();
    setLogLevel(config.LOG_LEVEL);
    const logDir = args.logDir ?? config.LOG_DIR;
    if (logDir) {
      enableFileLogging(logDir);
    }

    const cutoffDate = computeCutoffDate(args.days);
    const accounts = args.accounts ?? config.INSTAGRAM_ACCOUNTS;
    logger.info(`Fetching posts from the last ${args.days} day(s) (since ${cutoffDate.toISOString()}).`);
    logger.info(`Processing ${accounts.length} account(s): ${accounts.join(', ')}`);

    const session = await openBrowserSession({
      ...config,
      HEADLESS: args.headless || config.HEADLESS,
    });

    process.once('SIGINT', onInterrupt);
    let results: AccountResult[];
    try {
      results = await scrapeAccounts(session.page, accounts, cutoffDate, {
        baseUrl: config.INSTAGRAM_URL,
        maxPostsPerAccount: args.maxPosts ?? config.MAX_POSTS_PER_ACCOUNT,
        maxRetries: config.MAX_RETRIES,
        navigation: { timeoutMs: config.POST_LOAD_TIMEOUT_MS },
        signal: controller.signal,
      });
    } finally {
      process.removeListener('SIGINT', onInterrupt);
      logger.debug('Closing browser session.');
      await session.close();
    }

    const posts = results.flatMap((result) => result.posts);
    if (!posts.length) {
      logger.info('No new posts found. No report generated.');
      return 0;
    }

    logger.info(`Found ${posts.length} total post(s). Generating report...`);
    const reportPath = await writeHtmlReport(posts, cutoffDate, args.output ?? config.OUTPUT_DIR, {
      timeZone: config.TIMEZONE,
    });
    if (reportPath) {
      logger.info(`Report generated: ${reportPath}`);
    }

    logger.info('Scraping process completed successfully.');
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      process.stderr.write(`\n${USAGE}`);
      return 1;
    }
    logger.error(`A critical error occurred: ${errorMessage(error)}`);
    return 1;
  }
};

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error(`Fatal: ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
