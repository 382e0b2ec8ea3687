import dotenv from 'dotenv';
import type { ZodIssue } from 'zod';
import { CrawlerConfigSchema, type CrawlerConfig } from '../types/CrawlerConfig';

// Load environment variables from .env file
dotenv.config();

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

/**
 * Parses a cookie header style string ("NNB=abc; NACT=1") into name/value pairs.
 * Segments without "=" or with an empty name are ignored.
 */
export function parseCookieString(raw: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!raw) {
    return cookies;
  }

  for (const segment of raw.split(';')) {
    const separator = segment.indexOf('=');
    if (separator <= 0) {
      continue;
    }
    const name = segment.slice(0, separator).trim();
    const value = segment.slice(separator + 1).trim();
    if (name) {
      cookies[name] = value;
    }
  }

  return cookies;
}

/**
 * Loads and validates crawler configuration from environment variables
 * @returns Validated crawler configuration
 * @throws Error if configuration is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  const config = {
    entryUrl: env.NAVER_ENTRY_URL || undefined,
    browserEngine: env.BROWSER_ENGINE || undefined,
    headless: parseBoolean(env.HEADLESS),
    cookies: parseCookieString(env.NAVER_COOKIES),
    cookieDomain: env.NAVER_COOKIE_DOMAIN || undefined,
    maxLaunchAttempts: parseInteger(env.MAX_LAUNCH_ATTEMPTS),
    retryBaseDelayMs: parseInteger(env.RETRY_BASE_DELAY_MS),
    retryStepMs: parseInteger(env.RETRY_STEP_MS),
    navigationTimeoutMs: parseInteger(env.NAVIGATION_TIMEOUT_MS),
    defaultTimeoutMs: parseInteger(env.DEFAULT_TIMEOUT_MS),
    proxy: env.PROXY_SERVER
      ? {
          server: env.PROXY_SERVER,
          username: env.PROXY_USERNAME || undefined,
          password: env.PROXY_PASSWORD || undefined,
        }
      : undefined,
    cacheDbPath: env.CACHE_DB_PATH || undefined,
    cacheTtlSeconds: parseInteger(env.CACHE_TTL_SECONDS),
    outputDir: env.OUTPUT_DIR || undefined,
    logLevel: env.LOG_LEVEL || undefined,
  };

  const result = CrawlerConfigSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors.map((e: ZodIssue) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  return result.data;
}
