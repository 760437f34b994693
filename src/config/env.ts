import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Crawl limits
  MAX_PAGES_PER_SITE: parseInt(process.env.SCRAPER_MAX_PAGES_PER_SITE || '10', 10),
  MAX_CRAWL_DEPTH: parseInt(process.env.SCRAPER_MAX_CRAWL_DEPTH || '2', 10),
  FOLLOW_EXTERNAL_LINKS: process.env.SCRAPER_FOLLOW_EXTERNAL_LINKS === 'true', // Default false

  // Politeness
  PER_DOMAIN_INTERVAL_MS: parseInt(process.env.SCRAPER_PER_DOMAIN_INTERVAL_MS || '2000', 10),
  RESPECT_ROBOTS_TXT: process.env.SCRAPER_RESPECT_ROBOTS_TXT !== 'false', // Default true
  USER_AGENT: process.env.SCRAPER_USER_AGENT || 'MultipageEntityScraper/1.0',

  // Timeouts
  PAGE_TIMEOUT_S: parseFloat(process.env.SCRAPER_PAGE_TIMEOUT_S || '30'),
  SITE_TIMEOUT_S: parseFloat(process.env.SCRAPER_SITE_TIMEOUT_S || '300'),

  // Resilience
  MAX_RETRIES: parseInt(process.env.SCRAPER_MAX_RETRIES || '3', 10),
  RETRY_BACKOFF_BASE_MS: parseInt(process.env.SCRAPER_RETRY_BACKOFF_BASE_MS || '1000', 10),

  // Batch
  BATCH_CONCURRENCY: parseInt(process.env.SCRAPER_BATCH_CONCURRENCY || '5', 10),
  MEMORY_BUDGET_MB: parseInt(process.env.SCRAPER_MEMORY_BUDGET_MB || '512', 10),
  PROGRESS_BUFFER_SIZE: parseInt(process.env.SCRAPER_PROGRESS_BUFFER_SIZE || '1000', 10),

  // Rendering hook
  MIN_VISIBLE_TEXT_LENGTH: parseInt(process.env.SCRAPER_MIN_VISIBLE_TEXT_LENGTH || '50', 10),
} as const;

export default env;
