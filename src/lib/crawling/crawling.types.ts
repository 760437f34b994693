/**
 * Crawling Types
 * Type definitions for site discovery and the page queue
 */

/**
 * Page classification labels
 */
export enum PageType {
  HOME = 'home',
  MENU = 'menu',
  CONTACT = 'contact',
  ABOUT = 'about',
  HOURS = 'hours',
  OTHER = 'other',
}

/**
 * Link filtering configuration
 */
export interface LinkFilterConfig {
  /**
   * Maximum links returned per page (mirrors max pages per site)
   */
  maxLinks: number;

  /**
   * Whether to follow links to other domains
   */
  followExternalLinks: boolean;

  /**
   * URL patterns (regex) a link must match, when non-empty
   */
  includePatterns: string[];

  /**
   * URL patterns (regex) that reject a link
   */
  excludePatterns: string[];
}

/**
 * One page to fetch within a site crawl
 */
export interface PageTask {
  /**
   * Normalized absolute URL
   */
  url: string;

  /**
   * Discovery depth (0 = start page)
   */
  depth: number;

  /**
   * Page that linked here (null for the start page)
   */
  parentUrl: string | null;

  /**
   * Page type assigned after classification
   */
  pageTypeHint: PageType | null;

  /**
   * Enqueue order within the site (start page = 0)
   */
  sequence: number;
}

/**
 * Classification rule for one page type
 */
export interface PageTypeRule {
  type: PageType;
  /** Crawl order rank for links whose URL matches this rule; higher goes first */
  priority: number;
  /** Regex patterns tested against the lowercased URL path */
  urlPatterns: string[];
  /** Substrings looked for in h1-h6 text */
  headings: string[];
  /** Substrings looked for in class attributes */
  classes: string[];
  /** Substrings counted in visible text */
  keywords: string[];
}

/**
 * Outcome of classifying one page
 */
export interface ClassificationResult {
  pageType: PageType;
  discoveredLinks: string[];
}

/**
 * Site crawl statistics
 */
export interface CrawlingStatistics {
  /**
   * Pages fetched (any outcome except duplicate skip)
   */
  pagesAttempted: number;

  /**
   * Pages fetched and processed successfully
   */
  pagesSucceeded: number;

  /**
   * Pages that failed or timed out
   */
  pagesFailed: number;

  /**
   * Pages skipped as duplicates, plus queued pages never reached
   */
  pagesSkipped: number;

  /**
   * Number of links discovered
   */
  linksDiscovered: number;

  /**
   * Number of duplicates detected
   */
  duplicatesDetected: number;

  /**
   * Maximum depth reached
   */
  depthReached: number;

  /**
   * Total crawling time in milliseconds
   */
  durationMs: number;

  /**
   * Average time per page in milliseconds
   */
  averagePageTime: number;

  /**
   * Success rate (0-1)
   */
  successRate: number;
}
