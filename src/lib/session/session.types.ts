/**
 * Batch Session Types
 * Type definitions for multi-site batch runs
 */

import type { CrawlConfig } from '../../config/crawl.config';
import type { EntityRecord } from '../aggregation/aggregation.types';
import type { CrawlingStatistics } from '../crawling/crawling.types';
import type { FieldSchema } from '../extraction/extraction.types';
import type { PageResult } from '../orchestration/orchestrator.types';
import type { FetchImpl, PageRenderer } from '../scraping/scraping.types';
import type { ProgressChannel } from './progress-channel';
import type { ResourceMonitor } from './resource-monitor';

export type SkipReason = 'memory_budget_exceeded' | 'cancelled';

/**
 * A site that reached DONE
 */
export interface SiteRecord {
  siteUrl: string;
  record: EntityRecord;
  statistics: CrawlingStatistics;
  pages: readonly PageResult[];
}

/**
 * A site that FAILED or whose crawl threw
 */
export interface SiteFailure {
  siteUrl: string;
  reason: string;

  /**
   * Null when the crawl threw before producing statistics
   */
  statistics: CrawlingStatistics | null;

  pages: readonly PageResult[];
}

/**
 * A site never launched
 */
export interface SiteSkip {
  siteUrl: string;
  reason: SkipReason;
}

export interface BatchCounters {
  sitesAttempted: number;
  sitesSucceeded: number;
  sitesFailed: number;
  sitesNotStarted: number;
  pagesProcessed: number;
  pagesSucceeded: number;
  pagesFailed: number;
  elapsedMs: number;
  memoryHighWaterMb: number;
}

/**
 * Outcome of one run. Frozen on creation; order of records need not match input order.
 */
export interface BatchResult {
  readonly records: readonly SiteRecord[];
  readonly failures: readonly SiteFailure[];
  readonly notStarted: readonly SiteSkip[];
  readonly counters: BatchCounters;
  readonly startedAt: string;
  readonly completedAt: string;
}

export interface BatchRunOptions {
  schema?: FieldSchema;
  signal?: AbortSignal;
}

export interface BatchSessionOptions {
  /**
   * Overrides applied on top of the environment defaults
   */
  config?: Partial<CrawlConfig>;

  fetchImpl?: FetchImpl;
  renderer?: PageRenderer | null;
  resourceMonitor?: ResourceMonitor;
  progress?: ProgressChannel;
  clock?: () => number;
}
