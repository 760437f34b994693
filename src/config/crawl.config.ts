/**
 * Crawl Configuration
 * Validated options for batch runs. Defaults come from the environment.
 */

import { z } from 'zod';
import { env } from './env';
import { ConfigurationError } from '../lib/scraping/errors';

const regexPattern = z.string().refine(
  (pattern) => {
    try {
      new RegExp(pattern);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Invalid regular expression' }
);

export const crawlConfigSchema = z.object({
  maxPagesPerSite: z.number().int().positive(),
  maxCrawlDepth: z.number().int().nonnegative(),
  perDomainIntervalMs: z.number().nonnegative(),
  pageTimeoutSeconds: z.number().positive(),
  siteTimeoutSeconds: z.number().positive(),
  maxRetries: z.number().int().nonnegative(),
  retryBaseDelayMs: z.number().nonnegative(),
  followExternalLinks: z.boolean(),
  includePatterns: z.array(regexPattern),
  excludePatterns: z.array(regexPattern),
  batchConcurrency: z.number().int().positive(),
  respectRobotsTxt: z.boolean(),
  userAgent: z.string().min(1),
  memoryBudgetMb: z.number().positive(),
  progressBufferSize: z.number().int().positive(),
  minVisibleTextLength: z.number().int().nonnegative(),
});

export type CrawlConfig = z.infer<typeof crawlConfigSchema>;

export const DEFAULT_CRAWL_CONFIG: CrawlConfig = {
  maxPagesPerSite: env.MAX_PAGES_PER_SITE,
  maxCrawlDepth: env.MAX_CRAWL_DEPTH,
  perDomainIntervalMs: env.PER_DOMAIN_INTERVAL_MS,
  pageTimeoutSeconds: env.PAGE_TIMEOUT_S,
  siteTimeoutSeconds: env.SITE_TIMEOUT_S,
  maxRetries: env.MAX_RETRIES,
  retryBaseDelayMs: env.RETRY_BACKOFF_BASE_MS,
  followExternalLinks: env.FOLLOW_EXTERNAL_LINKS,
  includePatterns: [],
  excludePatterns: [],
  batchConcurrency: env.BATCH_CONCURRENCY,
  respectRobotsTxt: env.RESPECT_ROBOTS_TXT,
  userAgent: env.USER_AGENT,
  memoryBudgetMb: env.MEMORY_BUDGET_MB,
  progressBufferSize: env.PROGRESS_BUFFER_SIZE,
  minVisibleTextLength: env.MIN_VISIBLE_TEXT_LENGTH,
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Every invalid key is reported in one ConfigurationError.
 */
export function resolveCrawlConfig(overrides: Partial<CrawlConfig> = {}): CrawlConfig {
  const parsed = crawlConfigSchema.safeParse({ ...DEFAULT_CRAWL_CONFIG, ...overrides });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`);
    throw new ConfigurationError(issues);
  }

  return parsed.data;
}
