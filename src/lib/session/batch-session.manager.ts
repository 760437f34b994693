/**
 * Batch Session Manager
 * Runs site orchestrators through a bounded worker pool that shares one
 * rate limiter and one robots.txt cache, and collects a frozen BatchResult
 */

import { CrawlConfig, DEFAULT_CRAWL_CONFIG, resolveCrawlConfig } from '../../config/crawl.config';
import { deepFreeze } from '../aggregation/freeze';
import { FieldSchema } from '../extraction/extraction.types';
import { RESTAURANT_SCHEMA } from '../extraction/schemas/restaurant.schema';
import { SiteCrawlResult, SiteProgressEvent, SiteState } from '../orchestration/orchestrator.types';
import { SiteOrchestrator } from '../orchestration/site-orchestrator';
import { DomainRateLimiter } from '../rate-limit';
import { Fetcher } from '../scraping/fetcher';
import { RobotsChecker } from '../scraping/robots';
import { FetchImpl, PageRenderer } from '../scraping/scraping.types';
import { ProgressChannel } from './progress-channel';
import { ProcessResourceMonitor, ResourceMonitor } from './resource-monitor';
import {
  BatchCounters,
  BatchResult,
  BatchRunOptions,
  BatchSessionOptions,
  SiteFailure,
  SiteRecord,
  SiteSkip,
  SkipReason,
} from './session.types';

/**
 * State of one run; nothing here outlives it
 */
interface RunState {
  config: CrawlConfig;
  schema: FieldSchema;
  fetcher: Fetcher;
  urls: string[];
  signal: AbortSignal | null;
  nextIndex: number;
  stopReason: SkipReason | null;
  sitesCompleted: number;
  records: SiteRecord[];
  failures: SiteFailure[];
  counters: BatchCounters;
}

function roundMb(value: number): number {
  return Math.round(value * 100) / 100;
}

export class BatchSessionManager {
  readonly progress: ProgressChannel;

  private readonly overrides: Partial<CrawlConfig>;
  private readonly fetchImpl: FetchImpl | undefined;
  private readonly renderer: PageRenderer | null;
  private readonly monitor: ResourceMonitor;
  private readonly clock: () => number;

  constructor(options: BatchSessionOptions = {}) {
    this.overrides = { ...options.config };
    this.fetchImpl = options.fetchImpl;
    this.renderer = options.renderer ?? null;
    this.monitor = options.resourceMonitor ?? new ProcessResourceMonitor();
    this.clock = options.clock ?? (() => Date.now());
    this.progress = options.progress ?? new ProgressChannel(resolveBufferSize(this.overrides));
  }

  /**
   * Crawl every URL. Only an invalid configuration rejects; every site
   * outcome, failure or skip is reported in the result.
   */
  async run(urls: string[], options: BatchRunOptions = {}): Promise<BatchResult> {
    const config = resolveCrawlConfig(this.overrides);
    const startTime = this.clock();

    const rateLimiter = new DomainRateLimiter({ intervalMs: config.perDomainIntervalMs });
    const robots = config.respectRobotsTxt
      ? new RobotsChecker({
          userAgent: config.userAgent,
          fetchTimeoutMs: config.pageTimeoutSeconds * 1000,
          fetchImpl: this.fetchImpl,
        })
      : null;

    const state: RunState = {
      config,
      schema: options.schema ?? RESTAURANT_SCHEMA,
      fetcher: new Fetcher({
        rateLimiter,
        robots,
        fetchImpl: this.fetchImpl,
        userAgent: config.userAgent,
        pageTimeoutMs: config.pageTimeoutSeconds * 1000,
        maxRetries: config.maxRetries,
        retryBaseDelayMs: config.retryBaseDelayMs,
      }),
      urls: [...urls],
      signal: options.signal ?? null,
      nextIndex: 0,
      stopReason: null,
      sitesCompleted: 0,
      records: [],
      failures: [],
      counters: {
        sitesAttempted: 0,
        sitesSucceeded: 0,
        sitesFailed: 0,
        sitesNotStarted: 0,
        pagesProcessed: 0,
        pagesSucceeded: 0,
        pagesFailed: 0,
        elapsedMs: 0,
        memoryHighWaterMb: 0,
      },
    };

    console.log(`Batch: ${urls.length} sites, concurrency ${config.batchConcurrency}`);

    const workerCount = Math.min(config.batchConcurrency, state.urls.length);
    await Promise.all(Array.from({ length: workerCount }, () => this.worker(state)));

    const notStarted: SiteSkip[] = state.urls
      .slice(state.nextIndex)
      .map((siteUrl) => ({ siteUrl, reason: state.stopReason ?? 'cancelled' }));

    const completedTime = this.clock();
    state.counters.sitesNotStarted = notStarted.length;
    state.counters.elapsedMs = completedTime - startTime;
    state.counters.memoryHighWaterMb = roundMb(state.counters.memoryHighWaterMb);

    this.progress.publish({
      type: 'batch_completed',
      siteUrl: null,
      pageUrl: null,
      pageType: null,
      status: null,
      pagesCompleted: state.counters.pagesProcessed,
      pagesTotal: state.counters.pagesProcessed,
      sitesCompleted: state.sitesCompleted,
      sitesTotal: state.urls.length,
      timestamp: completedTime,
    });

    console.log(
      `Batch: done in ${state.counters.elapsedMs}ms, ${state.counters.sitesSucceeded} succeeded, ` +
        `${state.counters.sitesFailed} failed, ${notStarted.length} not started`
    );

    return deepFreeze({
      records: state.records,
      failures: state.failures,
      notStarted,
      counters: state.counters,
      startedAt: new Date(startTime).toISOString(),
      completedAt: new Date(completedTime).toISOString(),
    });
  }

  /**
   * Take sites off the shared list until it is empty or launching must stop
   */
  private async worker(state: RunState): Promise<void> {
    while (state.nextIndex < state.urls.length && state.stopReason === null) {
      if (state.signal?.aborted) {
        state.stopReason = 'cancelled';
        break;
      }

      const memoryMb = this.sampleMemory(state);
      if (memoryMb > state.config.memoryBudgetMb) {
        console.warn(
          `Batch: memory ${roundMb(memoryMb)}MB above budget ${state.config.memoryBudgetMb}MB, no new sites will start`
        );
        state.stopReason = 'memory_budget_exceeded';
        break;
      }

      const siteUrl = state.urls[state.nextIndex];
      state.nextIndex++;
      state.counters.sitesAttempted++;

      await this.crawlSite(state, siteUrl);
      this.sampleMemory(state);
    }
  }

  private async crawlSite(state: RunState, siteUrl: string): Promise<void> {
    let result: SiteCrawlResult;
    let counted = false;
    // A site_completed event already counts its own site
    const markCompleted = (): void => {
      if (!counted) {
        counted = true;
        state.sitesCompleted++;
      }
    };

    try {
      const orchestrator = new SiteOrchestrator(siteUrl, {
        config: state.config,
        fetcher: state.fetcher,
        schema: state.schema,
        renderer: this.renderer,
        signal: state.signal ?? undefined,
        clock: this.clock,
        onProgress: (event: SiteProgressEvent) => {
          if (event.type === 'site_completed') {
            markCompleted();
          }
          this.progress.publish({ ...event, sitesCompleted: state.sitesCompleted, sitesTotal: state.urls.length });
        },
      });
      result = await orchestrator.run();
      markCompleted();
    } catch (error: unknown) {
      markCompleted();
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Batch: site ${siteUrl} crashed: ${message}`);
      state.failures.push({ siteUrl, reason: `unexpected error: ${message}`, statistics: null, pages: [] });
      state.counters.sitesFailed++;
      return;
    }

    for (const page of result.pages) {
      state.counters.pagesProcessed++;
      if (page.status === 'success') {
        state.counters.pagesSucceeded++;
      } else if (page.status === 'failed' || page.status === 'timeout') {
        state.counters.pagesFailed++;
      }
    }

    if (result.state === SiteState.DONE && result.record) {
      state.records.push({ siteUrl, record: result.record, statistics: result.statistics, pages: result.pages });
      state.counters.sitesSucceeded++;
      return;
    }

    state.failures.push({
      siteUrl,
      reason: result.failureReason ?? 'unknown failure',
      statistics: result.statistics,
      pages: result.pages,
    });
    state.counters.sitesFailed++;
  }

  private sampleMemory(state: RunState): number {
    const memoryMb = this.monitor.sampleMemoryMb();
    state.counters.memoryHighWaterMb = Math.max(state.counters.memoryHighWaterMb, memoryMb);
    return memoryMb;
  }
}

/**
 * The channel exists before run() validates; an unusable size falls back to the default
 */
function resolveBufferSize(overrides: Partial<CrawlConfig>): number {
  const size = overrides.progressBufferSize;
  return typeof size === 'number' && Number.isFinite(size) && size > 0 ? size : DEFAULT_CRAWL_CONFIG.progressBufferSize;
}
