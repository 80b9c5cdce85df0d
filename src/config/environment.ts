/**
 * Environment configuration for the news pipeline
 * Loaded once at startup and passed to every stage that needs it
 */

import { z } from 'zod';
import { LOG_LEVELS, LogLevel } from '../utils/logger';

export interface EnvironmentConfig {
  news: {
    outputDir: string;
    timeZone: string;
  };
  ingestion: {
    concurrencyLimit: number;
    articleConcurrency: number;
    fetchTimeoutMs: number;
    fetchRetries: number;
  };
  clustering: {
    threshold: number;
  };
  summarizer: {
    apiKey: string | null;
    baseURL: string;
    model: string;
  };
  logging: {
    level: LogLevel;
  };
}

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  NEWS_OUTPUT_DIR: z.string().min(1).default('docs/news'),
  NEWS_TIMEZONE: z
    .string()
    .default('Asia/Ho_Chi_Minh')
    .refine(isValidTimeZone, { message: 'must be an IANA time zone' }),
  CONCURRENCY_LIMIT: positiveInt(4),
  ARTICLE_CONCURRENCY: positiveInt(4),
  FETCH_TIMEOUT_MS: positiveInt(15000),
  FETCH_RETRIES: z.coerce.number().int().min(0).default(2),
  CLUSTER_THRESHOLD: z.coerce.number().min(0).max(1).default(0.75),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  SUMMARY_MODEL: z.string().min(1).default('xiaomi/mimo-v2-flash:free'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

/**
 * Load and validate environment configuration
 * @throws Error if a variable is present but malformed
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  // Empty strings behave as unset so `FOO=` in a .env file keeps the default
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    news: {
      outputDir: vars.NEWS_OUTPUT_DIR,
      timeZone: vars.NEWS_TIMEZONE
    },
    ingestion: {
      concurrencyLimit: vars.CONCURRENCY_LIMIT,
      articleConcurrency: vars.ARTICLE_CONCURRENCY,
      fetchTimeoutMs: vars.FETCH_TIMEOUT_MS,
      fetchRetries: vars.FETCH_RETRIES
    },
    clustering: {
      threshold: vars.CLUSTER_THRESHOLD
    },
    summarizer: {
      apiKey: vars.OPENROUTER_API_KEY ?? null,
      baseURL: vars.OPENROUTER_BASE_URL,
      model: vars.SUMMARY_MODEL
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}
