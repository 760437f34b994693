/**
 * Domain Rate Limiter
 * Per-domain minimum spacing between requests, shared across site crawls
 */

import { extractDomain } from '../crawling/url-normalizer';
import { RateLimitConfig, RateLimitReservation, RateLimitStats } from './rate-limit.types';

export class DomainRateLimiter {
  private nextSlots: Map<string, number> = new Map();
  private overrides: Map<string, number> = new Map();
  private intervalMs: number;
  private stats = {
    totalRequests: 0,
    delayedRequests: 0,
    totalWaitMs: 0,
  };

  constructor(config: RateLimitConfig) {
    this.intervalMs = config.intervalMs;
  }

  /**
   * Wait until the URL's domain may be requested again.
   * Blocks the caller instead of dropping the request.
   */
  async acquire(url: string): Promise<RateLimitReservation> {
    const reservation = this.reserve(url);

    if (reservation.waitMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, reservation.waitMs));
    }

    return reservation;
  }

  /**
   * Reserve the next slot for a domain.
   * Read and write happen without yielding, which keeps one update path per key
   * even when several crawls share a domain.
   */
  reserve(url: string, now: number = Date.now()): RateLimitReservation {
    const domain = this.domainKey(url);
    const interval = this.getInterval(domain);
    const nextSlot = this.nextSlots.get(domain);

    const scheduledAt = nextSlot !== undefined ? Math.max(now, nextSlot) : now;
    this.nextSlots.set(domain, scheduledAt + interval);

    const waitMs = scheduledAt - now;
    this.stats.totalRequests++;
    if (waitMs > 0) {
      this.stats.delayedRequests++;
      this.stats.totalWaitMs += waitMs;
    }

    return { domain, scheduledAt, waitMs };
  }

  /**
   * Set a per-domain interval (e.g. from robots.txt Crawl-delay)
   */
  setDomainInterval(urlOrDomain: string, intervalMs: number): void {
    this.overrides.set(this.domainKey(urlOrDomain), intervalMs);
  }

  /**
   * Effective interval for a domain key
   */
  getInterval(domain: string): number {
    return this.overrides.get(domain) ?? this.intervalMs;
  }

  /**
   * Get rate limit statistics
   */
  getStats(): RateLimitStats {
    return {
      ...this.stats,
      activeKeys: this.nextSlots.size,
    };
  }

  private domainKey(urlOrDomain: string): string {
    const domain = urlOrDomain.includes('://') ? extractDomain(urlOrDomain) : urlOrDomain.toLowerCase();
    return domain || urlOrDomain;
  }
}
