/**
 * Fetcher
 * Single-page HTTP GET with robots.txt check, per-domain rate limiting,
 * per-attempt timeout and retry of transient failures
 */

import { DomainRateLimiter } from '../rate-limit';
import { extractDomain, normalizeUrl } from '../crawling/url-normalizer';
import {
  PermanentFetchError,
  PolicyBlockedError,
  TimeoutError,
  classifyError,
  classifyStatus,
  toFailureKind,
  withRetry,
} from './errors';
import { buildHeaders, withReferer } from './headers';
import { RobotsChecker } from './robots';
import { FetchImpl, FetchOutcome, FetchRequestOptions, FetchSuccess } from './scraping.types';

export interface FetcherOptions {
  rateLimiter: DomainRateLimiter;
  /** Omit to skip robots.txt checks */
  robots?: RobotsChecker | null;
  fetchImpl?: FetchImpl;
  userAgent: string;
  pageTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export class Fetcher {
  private readonly rateLimiter: DomainRateLimiter;
  private readonly robots: RobotsChecker | null;
  private readonly fetchImpl: FetchImpl;
  private readonly userAgent: string;
  private readonly pageTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly crawlDelayApplied = new Set<string>();

  constructor(options: FetcherOptions) {
    this.rateLimiter = options.rateLimiter;
    this.robots = options.robots ?? null;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.userAgent = options.userAgent;
    this.pageTimeoutMs = options.pageTimeoutMs;
    this.maxRetries = options.maxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs;
  }

  /**
   * Fetch one page. Never throws: every failure comes back classified.
   */
  async fetch(url: string, options: FetchRequestOptions = {}): Promise<FetchOutcome> {
    const timeoutMs = options.timeoutMs ?? this.pageTimeoutMs;
    const deadline = options.budgetMs !== undefined ? Date.now() + options.budgetMs : Number.POSITIVE_INFINITY;
    let attempts = 0;

    try {
      if (!normalizeUrl(url)) {
        throw new PermanentFetchError(`Malformed URL: ${url}`);
      }

      await this.checkPolicy(url);

      return await withRetry(
        async () => {
          await this.rateLimiter.acquire(url);

          if (options.signal?.aborted) {
            throw new TimeoutError('Request cancelled');
          }

          const remainingMs = deadline - Date.now();
          if (remainingMs <= 0) {
            throw new TimeoutError('Time budget spent before the request started');
          }

          attempts++;
          return this.attempt(url, Math.min(timeoutMs, remainingMs), options, attempts);
        },
        {
          maxRetries: this.maxRetries,
          baseDelay: this.retryBaseDelayMs,
          signal: options.signal,
          deadline,
          onRetry: (error, attempt, delayMs) => {
            console.warn(`Fetch ${url}: attempt ${attempt} failed (${error.message}), retrying in ${delayMs}ms`);
          },
        }
      );
    } catch (error: unknown) {
      const classified = classifyError(error);
      return {
        ok: false,
        failure: {
          kind: toFailureKind(classified),
          detail: classified.message,
          statusCode: classified.statusCode,
          attempts,
        },
      };
    }
  }

  /**
   * Consult robots.txt; widen the domain interval when it asks for a longer Crawl-delay
   */
  private async checkPolicy(url: string): Promise<void> {
    if (!this.robots) {
      return;
    }

    if (!(await this.robots.isAllowed(url))) {
      throw new PolicyBlockedError(`Disallowed by robots.txt: ${url}`);
    }

    const origin = new URL(url).origin;
    if (!this.crawlDelayApplied.has(origin)) {
      this.crawlDelayApplied.add(origin);
      const crawlDelayMs = await this.robots.getCrawlDelayMs(url);
      if (crawlDelayMs !== null && crawlDelayMs > this.rateLimiter.getInterval(extractDomain(url))) {
        this.rateLimiter.setDomainInterval(url, crawlDelayMs);
      }
    }
  }

  /**
   * One request bounded by the timeout (headers and body); a cancel aborts it early
   */
  private async attempt(
    url: string,
    timeoutMs: number,
    options: FetchRequestOptions,
    attempts: number
  ): Promise<FetchSuccess> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
    const onCancel = (): void => controller.abort();
    options.signal?.addEventListener('abort', onCancel, { once: true });

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: withReferer(buildHeaders(this.userAgent), options.referer ?? null),
        redirect: 'follow',
        signal: controller.signal,
      });

      const statusError = classifyStatus(response.status, response.headers.get('retry-after'));
      if (statusError) {
        throw statusError;
      }

      const content = await response.text();

      return {
        ok: true,
        content,
        statusCode: response.status,
        finalUrl: response.url || url,
        contentType: response.headers.get('content-type'),
        attempts,
      };
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onCancel);
    }
  }
}
