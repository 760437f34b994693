/**
 * Site Orchestrator
 * Breadth-first crawl of one site: fetch, classify and extract each page,
 * then hand every PageResult to the aggregator
 */

import { CrawlConfig } from '../../config/crawl.config';
import { CrawlingQueue } from '../crawling/crawling-queue';
import { CrawlingStatisticsTracker } from '../crawling/crawling-statistics';
import { PageTask, PageType } from '../crawling/crawling.types';
import { PageClassifier, pageClassifier } from '../crawling/page-classifier';
import { normalizeUrl } from '../crawling/url-normalizer';
import { DataAggregator, dataAggregator } from '../aggregation/data-aggregator';
import { ExtractionEngine, extractionEngine } from '../extraction/extraction.engine';
import { FieldSchema } from '../extraction/extraction.types';
import { RESTAURANT_SCHEMA } from '../extraction/schemas/restaurant.schema';
import { htmlProcessor } from '../processing';
import { Fetcher } from '../scraping/fetcher';
import { PageRenderer } from '../scraping/scraping.types';
import {
  PageResult,
  PageStatus,
  ProgressEventType,
  SiteCrawlResult,
  SiteProgressListener,
  SiteState,
} from './orchestrator.types';

export interface SiteOrchestratorOptions {
  config: CrawlConfig;
  fetcher: Fetcher;
  schema?: FieldSchema;
  classifier?: PageClassifier;
  extractionEngine?: ExtractionEngine;
  aggregator?: DataAggregator;

  /**
   * Consulted for pages with less visible text than `minVisibleTextLength`
   */
  renderer?: PageRenderer | null;

  onProgress?: SiteProgressListener;

  /**
   * Stops the crawl between pages; the page in flight completes
   */
  signal?: AbortSignal;

  clock?: () => number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SiteOrchestrator {
  private readonly siteUrl: string;
  private readonly config: CrawlConfig;
  private readonly fetcher: Fetcher;
  private readonly schema: FieldSchema;
  private readonly classifier: PageClassifier;
  private readonly engine: ExtractionEngine;
  private readonly aggregator: DataAggregator;
  private readonly renderer: PageRenderer | null;
  private readonly onProgress: SiteProgressListener | null;
  private readonly signal: AbortSignal | null;
  private readonly clock: () => number;

  private state: SiteState = SiteState.DISCOVERING;
  private readonly queue = new CrawlingQueue();
  private readonly results: PageResult[] = [];
  private readonly processed = new Set<string>();
  private statistics: CrawlingStatisticsTracker;
  private deadline = 0;
  private started = false;

  constructor(siteUrl: string, options: SiteOrchestratorOptions) {
    this.siteUrl = siteUrl;
    this.config = options.config;
    this.fetcher = options.fetcher;
    this.schema = options.schema ?? RESTAURANT_SCHEMA;
    this.classifier = options.classifier ?? pageClassifier;
    this.engine = options.extractionEngine ?? extractionEngine;
    this.aggregator = options.aggregator ?? dataAggregator;
    this.renderer = options.renderer ?? null;
    this.onProgress = options.onProgress ?? null;
    this.signal = options.signal ?? null;
    this.clock = options.clock ?? (() => Date.now());
    this.statistics = new CrawlingStatisticsTracker(this.clock());
  }

  getState(): SiteState {
    return this.state;
  }

  /**
   * Crawl the site once. A second call is rejected: crawl state belongs to a single run.
   */
  async run(): Promise<SiteCrawlResult> {
    if (this.started) {
      throw new Error(`Site ${this.siteUrl}: orchestrator already ran`);
    }
    this.started = true;

    const startTime = this.clock();
    this.statistics = new CrawlingStatisticsTracker(startTime);
    this.deadline = startTime + this.config.siteTimeoutSeconds * 1000;

    console.log(`Site ${this.siteUrl}: crawl started`);

    // DISCOVERING
    const startUrl = normalizeUrl(this.siteUrl);
    if (!startUrl) {
      return this.fail(`Malformed URL: ${this.siteUrl}`);
    }
    if (this.signal?.aborted) {
      return this.fail('cancelled');
    }

    this.queue.enqueue(startUrl, 0, null, PageType.HOME);
    const startTask = this.queue.dequeue();
    if (!startTask) {
      return this.fail(`Could not queue ${startUrl}`);
    }

    const first = await this.processTask(startTask);
    if (first.status !== 'success') {
      const outOfTime = first.status === 'timeout' && this.clock() >= this.deadline;
      return this.fail(outOfTime ? 'site timeout' : first.error ?? `start page ${first.status}`);
    }

    // CRAWLING
    this.state = SiteState.CRAWLING;

    while (!this.queue.isEmpty()) {
      if (this.signal?.aborted) {
        console.log(`Site ${this.siteUrl}: cancelled after ${this.results.length} pages`);
        break;
      }
      if (this.results.length >= this.config.maxPagesPerSite) {
        break;
      }
      if (this.clock() >= this.deadline) {
        console.warn(`Site ${this.siteUrl}: site timeout after ${this.results.length} pages`);
        break;
      }

      const task = this.queue.dequeue();
      if (!task) {
        break;
      }
      await this.processTask(task);
    }

    const leftover = this.queue.drain().length;
    if (leftover > 0) {
      this.statistics.recordSkipped(leftover);
    }

    // AGGREGATING
    this.state = SiteState.AGGREGATING;
    const succeeded = this.results.filter((result) => result.status === 'success').length;
    const record = this.aggregator.aggregate(this.siteUrl, this.results, this.schema);

    this.state = SiteState.DONE;
    const result: SiteCrawlResult = {
      siteUrl: this.siteUrl,
      state: SiteState.DONE,
      record,
      pages: [...this.results],
      statistics: this.statistics.getStatistics(this.clock()),
      failureReason: null,
    };

    console.log(
      `Site ${this.siteUrl}: done, ${succeeded}/${this.results.length} pages succeeded, confidence ${record.confidence}`
    );
    this.emit('site_completed', null, null, SiteState.DONE);
    return result;
  }

  /**
   * Fetch → classify → extract one task, record its PageResult and queue new links
   */
  private async processTask(task: PageTask): Promise<PageResult> {
    const pageStart = this.clock();
    this.emit('page_started', task.url, task.pageTypeHint, null);

    const outcome = await this.fetcher.fetch(task.url, {
      timeoutMs: this.config.pageTimeoutSeconds * 1000,
      budgetMs: Math.max(1, this.deadline - pageStart),
      referer: task.parentUrl,
      signal: this.signal ?? undefined,
    });
    this.processed.add(task.url);

    if (!outcome.ok) {
      const { failure } = outcome;
      console.warn(`Site ${this.siteUrl}: ${task.url} ${failure.kind} after ${failure.attempts} attempts: ${failure.detail}`);
      return this.recordFailure(task, pageStart, failure.kind === 'timeout' ? 'timeout' : 'failed', {
        statusCode: failure.statusCode ?? null,
        error: `${failure.kind}: ${failure.detail}`,
      });
    }

    const finalUrl = normalizeUrl(outcome.finalUrl) ?? task.url;
    if (finalUrl !== task.url && this.processed.has(finalUrl)) {
      this.statistics.recordDuplicate();
      return this.record({
        task,
        status: 'skipped-duplicate',
        pageType: task.pageTypeHint ?? PageType.OTHER,
        statusCode: outcome.statusCode,
        fields: {},
        discoveredLinks: [],
        durationMs: this.clock() - pageStart,
        error: `redirected to already processed ${finalUrl}`,
        finalUrl,
      });
    }
    this.processed.add(finalUrl);
    this.queue.markSeen(finalUrl);

    try {
      const html = await this.renderIfSparse(finalUrl, outcome.content);
      const classification = this.classifier.classify(finalUrl, html, {
        maxLinks: this.config.maxPagesPerSite,
        followExternalLinks: this.config.followExternalLinks,
        includePatterns: this.config.includePatterns,
        excludePatterns: this.config.excludePatterns,
        isKnown: (url) => this.queue.hasSeen(url),
      });
      const fields = await this.engine.extract({ html, url: finalUrl }, this.schema);

      this.statistics.recordLinkDiscovery(classification.discoveredLinks.length);
      this.enqueueLinks(task, classification.discoveredLinks);

      const durationMs = this.clock() - pageStart;
      this.statistics.recordPageVisit(task.depth, durationMs);

      return this.record({
        task,
        status: 'success',
        pageType: classification.pageType,
        statusCode: outcome.statusCode,
        fields,
        discoveredLinks: classification.discoveredLinks,
        durationMs,
        error: null,
        finalUrl,
      });
    } catch (error: unknown) {
      console.error(`Site ${this.siteUrl}: processing ${finalUrl} failed: ${errorMessage(error)}`);
      return this.recordFailure(task, pageStart, 'failed', {
        statusCode: outcome.statusCode,
        error: errorMessage(error),
        finalUrl,
      });
    }
  }

  /**
   * Queue links one level deeper while depth and page budget allow
   */
  private enqueueLinks(parent: PageTask, links: readonly string[]): void {
    const depth = parent.depth + 1;
    if (depth > this.config.maxCrawlDepth) {
      return;
    }

    for (const link of links) {
      if (this.queue.totalEnqueued() >= this.config.maxPagesPerSite) {
        this.statistics.recordSkipped(1);
        continue;
      }
      this.queue.enqueue(link, depth, parent.url, this.classifier.classifyByUrl(link));
    }
  }

  /**
   * Ask the renderer for pages whose markup carries almost no visible text.
   * Renderer failure keeps the fetched markup.
   */
  private async renderIfSparse(url: string, html: string): Promise<string> {
    if (!this.renderer) {
      return html;
    }
    if (htmlProcessor.visibleText(html).length >= this.config.minVisibleTextLength) {
      return html;
    }

    try {
      const rendered = await this.renderer.render(url, this.signal ?? undefined);
      return rendered.trim() ? rendered : html;
    } catch (error: unknown) {
      console.warn(`Site ${this.siteUrl}: rendering ${url} failed, keeping fetched markup: ${errorMessage(error)}`);
      return html;
    }
  }

  private recordFailure(
    task: PageTask,
    pageStart: number,
    status: PageStatus,
    detail: { statusCode: number | null; error: string; finalUrl?: string }
  ): PageResult {
    const durationMs = this.clock() - pageStart;
    this.statistics.recordFailed(task.depth, durationMs);

    return this.record({
      task,
      status,
      pageType: task.pageTypeHint ?? PageType.OTHER,
      statusCode: detail.statusCode,
      fields: {},
      discoveredLinks: [],
      durationMs,
      error: detail.error,
      finalUrl: detail.finalUrl ?? task.url,
    });
  }

  private record(result: PageResult): PageResult {
    const frozen = Object.freeze(result);
    this.results.push(frozen);
    this.emit('page_completed', result.task.url, result.pageType, result.status);
    return frozen;
  }

  private fail(reason: string): SiteCrawlResult {
    this.state = SiteState.FAILED;
    console.error(`Site ${this.siteUrl}: failed: ${reason}`);
    this.emit('site_completed', null, null, SiteState.FAILED);

    return {
      siteUrl: this.siteUrl,
      state: SiteState.FAILED,
      record: null,
      pages: [...this.results],
      statistics: this.statistics.getStatistics(this.clock()),
      failureReason: reason,
    };
  }

  /**
   * Publish a progress event; a throwing listener never interrupts the crawl
   */
  private emit(
    type: ProgressEventType,
    pageUrl: string | null,
    pageType: PageType | null,
    status: PageStatus | SiteState | null
  ): void {
    if (!this.onProgress) {
      return;
    }

    try {
      this.onProgress({
        type,
        siteUrl: this.siteUrl,
        pageUrl,
        pageType,
        status,
        pagesCompleted: this.results.length,
        pagesTotal: this.queue.totalEnqueued(),
        timestamp: this.clock(),
      });
    } catch (error: unknown) {
      console.error(`Site ${this.siteUrl}: progress listener failed: ${errorMessage(error)}`);
    }
  }
}
