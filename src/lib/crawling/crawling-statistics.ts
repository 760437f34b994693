/**
 * Crawling Statistics Tracker
 * Per-site crawl counters
 */

import { CrawlingStatistics } from './crawling.types';

export class CrawlingStatisticsTracker {
  private startTime: number;
  private pagesSucceeded: number = 0;
  private pagesFailed: number = 0;
  private pagesSkipped: number = 0;
  private linksDiscovered: number = 0;
  private duplicatesDetected: number = 0;
  private maxDepthReached: number = 0;
  private pageTimes: number[] = [];

  constructor(startTime: number = Date.now()) {
    this.startTime = startTime;
  }

  /**
   * Record a successfully processed page
   */
  recordPageVisit(depth: number, time: number): void {
    this.pagesSucceeded++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
  }

  /**
   * Record a failed or timed out page
   */
  recordFailed(depth: number, time: number): void {
    this.pagesFailed++;
    this.maxDepthReached = Math.max(this.maxDepthReached, depth);
    this.pageTimes.push(time);
  }

  /**
   * Record skipped pages
   */
  recordSkipped(count: number = 1): void {
    this.pagesSkipped += count;
  }

  /**
   * Record link discovery
   */
  recordLinkDiscovery(count: number): void {
    this.linksDiscovered += count;
  }

  /**
   * Record duplicate detection
   */
  recordDuplicate(): void {
    this.duplicatesDetected++;
    this.pagesSkipped++;
  }

  /**
   * Get final statistics
   */
  getStatistics(now: number = Date.now()): CrawlingStatistics {
    const averagePageTime =
      this.pageTimes.length > 0
        ? this.pageTimes.reduce((sum, time) => sum + time, 0) / this.pageTimes.length
        : 0;

    const pagesAttempted = this.pagesSucceeded + this.pagesFailed;
    const successRate = pagesAttempted > 0 ? this.pagesSucceeded / pagesAttempted : 0;

    return {
      pagesAttempted,
      pagesSucceeded: this.pagesSucceeded,
      pagesFailed: this.pagesFailed,
      pagesSkipped: this.pagesSkipped,
      linksDiscovered: this.linksDiscovered,
      duplicatesDetected: this.duplicatesDetected,
      depthReached: this.maxDepthReached,
      durationMs: now - this.startTime,
      averagePageTime,
      successRate,
    };
  }
}
