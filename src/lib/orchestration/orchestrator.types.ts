/**
 * Site Orchestration Types
 * Type definitions for the per-site crawl state machine
 */

import type { CrawlingStatistics, PageTask, PageType } from '../crawling/crawling.types';
import type { FieldMap } from '../extraction/extraction.types';
import type { EntityRecord } from '../aggregation/aggregation.types';

/**
 * Site crawl states
 */
export enum SiteState {
  DISCOVERING = 'discovering',
  CRAWLING = 'crawling',
  AGGREGATING = 'aggregating',
  DONE = 'done',
  FAILED = 'failed',
}

export type PageStatus = 'success' | 'failed' | 'timeout' | 'skipped-duplicate';

/**
 * Outcome of processing one PageTask. Never mutated once recorded.
 */
export interface PageResult {
  readonly task: PageTask;
  readonly status: PageStatus;
  readonly pageType: PageType;

  /**
   * HTTP status, null when no response arrived
   */
  readonly statusCode: number | null;

  readonly fields: FieldMap;
  readonly discoveredLinks: readonly string[];
  readonly durationMs: number;

  /**
   * Failure detail for failed, timed out and skipped pages
   */
  readonly error: string | null;

  /**
   * URL after redirects
   */
  readonly finalUrl: string;
}

export type ProgressEventType = 'page_started' | 'page_completed' | 'site_completed' | 'batch_completed';

/**
 * Progress notification
 */
export interface ProgressEvent {
  type: ProgressEventType;

  /**
   * Null for batch_completed
   */
  siteUrl: string | null;

  pageUrl: string | null;
  pageType: PageType | null;

  /**
   * Page status for page events, site state for site events
   */
  status: PageStatus | SiteState | null;

  pagesCompleted: number;
  pagesTotal: number;
  sitesCompleted: number;
  sitesTotal: number;
  timestamp: number;
}

/**
 * What an orchestrator knows about; batch-wide counts are filled in by the session
 */
export type SiteProgressEvent = Omit<ProgressEvent, 'sitesCompleted' | 'sitesTotal'>;

export type SiteProgressListener = (event: SiteProgressEvent) => void;

/**
 * Result of one site crawl
 */
export interface SiteCrawlResult {
  siteUrl: string;
  state: SiteState.DONE | SiteState.FAILED;

  /**
   * Aggregated record; null when the site failed
   */
  record: EntityRecord | null;

  pages: readonly PageResult[];
  statistics: CrawlingStatistics;

  /**
   * Why the site failed ("site timeout", the start-page failure, …)
   */
  failureReason: string | null;
}
