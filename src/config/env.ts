import 'dotenv/config';
import { z } from 'zod';
import logger from '../utils/logger';
import { ConfigError } from '../utils/errors';
import { envSchema, formatIssues } from '../validation/schemas';
import defaultAccounts from './accounts.json';

interface EnvConfig {
  INSTAGRAM_URL: string;
  INSTAGRAM_ACCOUNTS: string[];
  MAX_POSTS_PER_ACCOUNT: number;
  POST_LOAD_TIMEOUT_MS: number;
  MAX_RETRIES: number;
  TIMEZONE: string;
  OUTPUT_DIR: string;
  LOG_DIR?: string;
  LOG_LEVEL: string;
  HEADLESS: boolean;
  BROWSER_CDP_URL?: string;
  BROWSER_USER_DATA_DIR?: string;
  BROWSER_EXECUTABLE_PATH?: string;
  NODE_ENV: string;
}

const accountListSchema = z.array(z.string().min(1));

const loadDefaultAccounts = (): string[] => {
  const parsed = accountListSchema.safeParse(defaultAccounts);
  if (!parsed.success) {
    throw new ConfigError(`accounts.json is invalid: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
};

const getEnvConfig = (env: NodeJS.ProcessEnv = process.env): EnvConfig => {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const message = `Invalid environment configuration:\n${formatIssues(parsed.error)}`;
    logger.error(message);
    throw new ConfigError(message);
  }

  const config = parsed.data;
  const accounts = config.INSTAGRAM_ACCOUNTS.length
    ? config.INSTAGRAM_ACCOUNTS
    : loadDefaultAccounts();

  if (!config.INSTAGRAM_ACCOUNTS.length) {
    logger.debug(`INSTAGRAM_ACCOUNTS is not set. Using ${accounts.length} accounts from accounts.json.`);
  }

  if (!config.BROWSER_CDP_URL && !config.BROWSER_USER_DATA_DIR) {
    logger.warn('Neither BROWSER_CDP_URL nor BROWSER_USER_DATA_DIR is set. The browser will start without a logged-in session.');
  }

  return {
    ...config,
    INSTAGRAM_ACCOUNTS: accounts,
  };
};

export { getEnvConfig };
export type { EnvConfig };
