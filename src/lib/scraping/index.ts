/**
 * Scraping - Barrel Export
 *
 * Page fetching with:
 * - Per-domain rate limiting
 * - robots.txt compliance
 * - Error classification & retry strategies
 */

export * from './scraping.types';
export * from './errors';
export * from './headers';
export * from './robots';
export * from './fetcher';
