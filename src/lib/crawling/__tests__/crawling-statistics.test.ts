/**
 * Crawling Statistics Tests
 */

import { CrawlingStatisticsTracker } from '../crawling-statistics';

describe('CrawlingStatisticsTracker', () => {
  it('should summarize page outcomes', () => {
    const tracker = new CrawlingStatisticsTracker(1000);

    tracker.recordPageVisit(0, 100);
    tracker.recordPageVisit(1, 300);
    tracker.recordFailed(1, 200);
    tracker.recordDuplicate();
    tracker.recordLinkDiscovery(4);

    expect(tracker.getStatistics(2500)).toEqual({
      pagesAttempted: 3,
      pagesSucceeded: 2,
      pagesFailed: 1,
      pagesSkipped: 1,
      linksDiscovered: 4,
      duplicatesDetected: 1,
      depthReached: 1,
      durationMs: 1500,
      averagePageTime: 200,
      successRate: 2 / 3,
    });
  });

  it('should report zero rates before any page', () => {
    const stats = new CrawlingStatisticsTracker(0).getStatistics(0);

    expect(stats.successRate).toBe(0);
    expect(stats.averagePageTime).toBe(0);
  });
});
