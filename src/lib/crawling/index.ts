/**
 * Crawling System
 * Main export file for site discovery utilities
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './page-classifier';
export * from './crawling-queue';
export * from './crawling-statistics';
