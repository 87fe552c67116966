/**
 * Zod Validation Schemas
 *
 * Environment configuration and CLI arguments are both validated here so the
 * rest of the code only ever sees typed, bounded values.
 */

import { z } from 'zod';
import { DEFAULTS, LIMITS, TIMEOUTS } from '../config/constants';

export const isValidTimeZone = (timeZone: string): boolean => {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone });
    return true;
  } catch {
    return false;
  }
};

const intFromEnv = (fallback: number, min: number) =>
  z
    .string()
    .default(String(fallback))
    .transform(Number)
    .pipe(z.number().int().min(min));

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

// ============================================
// Environment Validation
// ============================================

export const envSchema = z.object({
  INSTAGRAM_URL: z
    .string()
    .url('Invalid Instagram base URL')
    .default(DEFAULTS.INSTAGRAM_URL)
    .transform((url) => url.replace(/\/+$/, '')),
  INSTAGRAM_ACCOUNTS: z
    .string()
    .default('')
    .transform((raw) =>
      raw
        .split(',')
        .map((account) => account.trim().replace(/^@/, ''))
        .filter(Boolean)
    ),
  MAX_POSTS_PER_ACCOUNT: intFromEnv(LIMITS.MAX_POSTS_PER_ACCOUNT, 1),
  POST_LOAD_TIMEOUT_MS: intFromEnv(TIMEOUTS.POST_LOAD, TIMEOUTS.POST_LOAD_MIN),
  MAX_RETRIES: intFromEnv(LIMITS.MAX_RETRIES, 0),
  TIMEZONE: z
    .string()
    .default(DEFAULTS.TIMEZONE)
    .refine(isValidTimeZone, (value) => ({ message: `Unknown time zone: ${value}` })),
  OUTPUT_DIR: z.string().min(1).default(DEFAULTS.OUTPUT_DIR),
  LOG_DIR: optionalString,
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly']).default('info'),
  HEADLESS: z.string().default('false').transform((v) => v === 'true'),
  BROWSER_CDP_URL: optionalString.pipe(z.string().url('Invalid CDP endpoint').optional()),
  BROWSER_USER_DATA_DIR: optionalString,
  BROWSER_EXECUTABLE_PATH: optionalString,
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type EnvInput = z.input<typeof envSchema>;
export type ParsedEnv = z.infer<typeof envSchema>;

// ============================================
// CLI Arguments
// ============================================

export const cliArgsSchema = z.object({
  days: z.coerce.number().int().min(0, 'Days must be zero or more').default(LIMITS.DEFAULT_DAYS),
  accounts: z
    .array(z.string().trim().min(1))
    .transform((accounts) => accounts.map((account) => account.replace(/^@/, '')))
    .optional(),
  output: z.string().min(1).optional(),
  logDir: z.string().min(1).optional(),
  headless: z.boolean().default(false),
  maxPosts: z.coerce.number().int().min(1, 'Max posts must be at least 1').optional(),
  help: z.boolean().default(false),
});

export type CliArgs = z.infer<typeof cliArgsSchema>;

/**
 * Format zod issues as `path: message` lines.
 */
export const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : 'input'}: ${issue.message}`)
    .join('\n');
