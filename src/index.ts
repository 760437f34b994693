/**
 * Multi-page Entity Scraper
 * Public entry point
 */

import { BatchSessionManager } from './lib/session/batch-session.manager';
import { BatchResult, BatchRunOptions, BatchSessionOptions } from './lib/session/session.types';

export * from './config/crawl.config';
export * from './lib/scraping';
export * from './lib/rate-limit';
export * from './lib/processing';
export * from './lib/crawling';
export * from './lib/extraction';
export * from './lib/aggregation';
export * from './lib/orchestration';
export * from './lib/session';

/**
 * Crawl a list of sites with a fresh session
 */
export function scrapeSites(
  urls: string[],
  options: BatchSessionOptions & BatchRunOptions = {}
): Promise<BatchResult> {
  const { schema, signal, ...sessionOptions } = options;
  return new BatchSessionManager(sessionOptions).run(urls, { schema, signal });
}
