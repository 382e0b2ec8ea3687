import { z } from 'zod';

/**
 * Schema for crawler runtime configuration
 */
export const CrawlerConfigSchema = z.object({
  entryUrl: z.string().url().default('https://fin.land.naver.com/search'),
  browserEngine: z.enum(['firefox', 'chromium']).default('firefox'),
  headless: z.boolean().default(true),
  cookies: z.record(z.string().min(1), z.string()).default({}),
  cookieDomain: z.string().min(1).default('.naver.com'),
  maxLaunchAttempts: z.number().int().positive().default(5),
  retryBaseDelayMs: z.number().int().nonnegative().default(20000),
  retryStepMs: z.number().int().nonnegative().default(1000),
  navigationTimeoutMs: z.number().int().positive().default(60000),
  defaultTimeoutMs: z.number().int().positive().default(30000),
  proxy: z
    .object({
      server: z.string().min(1),
      username: z.string().optional(),
      password: z.string().optional(),
    })
    .optional(),
  cacheDbPath: z.string().min(1).default('data/search-cache.db'),
  cacheTtlSeconds: z.number().int().positive().default(300),
  outputDir: z.string().min(1).default('output'),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
});

/**
 * TypeScript type for crawler configuration
 */
export type CrawlerConfig = z.infer<typeof CrawlerConfigSchema>;
