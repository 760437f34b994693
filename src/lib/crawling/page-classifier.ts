/**
 * Page Classifier
 * Assigns a page type from URL and content cues and extracts candidate links
 */

import * as cheerio from 'cheerio';
import {
  ClassificationResult,
  LinkFilterConfig,
  PageType,
  PageTypeRule,
} from './crawling.types';
import { isCrawlableHref, normalizeUrl, shouldFollowLink } from './url-normalizer';
import { htmlProcessor } from '../processing';
import ruleTable from './page-type-rules.json';

export interface ClassifyContext extends LinkFilterConfig {
  /**
   * URLs already visited or queued for the site
   */
  isKnown?: (url: string) => boolean;
}

export interface PageClassifierOptions {
  /**
   * Ordered rule table; earlier rules win ties
   */
  rules?: PageTypeRule[];

  /**
   * Minimum content score for a content-based match
   */
  minContentScore?: number;

  /**
   * Path words that mark a link as not worth crawling
   */
  irrelevantKeywords?: string[];
}

const HEADING_WEIGHTS: Record<string, number> = {
  h1: 3,
  h2: 2,
  h3: 2,
  h4: 1,
  h5: 1,
  h6: 1,
};

const KEYWORD_COUNT_CAP = 3;

// Rank for links no rule matches
const DEFAULT_LINK_PRIORITY = 1;

function toPageType(value: string): PageType | null {
  return Object.values(PageType).find((type) => type === value) ?? null;
}

/**
 * Load the bundled rule table
 */
export function loadDefaultRules(): PageTypeRule[] {
  return ruleTable.rules.flatMap((rule) => {
    const type = toPageType(rule.type);
    return type ? [{ ...rule, type }] : [];
  });
}

export function loadDefaultIrrelevantKeywords(): string[] {
  return [...ruleTable.irrelevantPathKeywords];
}

export class PageClassifier {
  private rules: PageTypeRule[];
  private urlMatchers: Array<{ type: PageType; priority: number; patterns: RegExp[] }>;
  private minContentScore: number;
  private irrelevantKeywords: Set<string>;

  constructor(options: PageClassifierOptions = {}) {
    this.rules = options.rules ?? loadDefaultRules();
    this.minContentScore = options.minContentScore ?? 3;
    this.irrelevantKeywords = new Set(
      (options.irrelevantKeywords ?? loadDefaultIrrelevantKeywords()).map((keyword) => keyword.toLowerCase())
    );
    this.urlMatchers = this.rules.map((rule) => ({
      type: rule.type,
      priority: rule.priority,
      patterns: rule.urlPatterns.map((pattern) => new RegExp(pattern, 'i')),
    }));
  }

  /**
   * Classify a page and collect the links worth crawling next
   */
  classify(url: string, html: string, context: ClassifyContext): ClassificationResult {
    const $ = htmlProcessor.load(html);

    return {
      pageType: this.classifyPage(url, $, html),
      discoveredLinks: this.discoverLinks($, url, context),
    };
  }

  /**
   * URL rules first, then content scoring
   */
  classifyPage(url: string, $: cheerio.CheerioAPI, html: string): PageType {
    const byUrl = this.classifyByUrl(url);
    if (byUrl) {
      return byUrl;
    }

    return this.classifyByContent($, html);
  }

  classifyByUrl(url: string): PageType | null {
    return this.matchUrl(url)?.type ?? null;
  }

  /**
   * Crawl rank of a link from the rule its URL matches
   */
  linkPriority(url: string): number {
    return this.matchUrl(url)?.priority ?? DEFAULT_LINK_PRIORITY;
  }

  /**
   * Whether any path word of the link is on the irrelevant list
   */
  isIrrelevantLink(url: string): boolean {
    let path: string;
    try {
      path = new URL(url).pathname.toLowerCase();
    } catch {
      return true;
    }

    return path.split(/[^a-z0-9]+/).some((word) => this.irrelevantKeywords.has(word));
  }

  private matchUrl(url: string): { type: PageType; priority: number } | null {
    let path: string;
    try {
      path = new URL(url).pathname.toLowerCase();
    } catch {
      return null;
    }

    return this.urlMatchers.find((matcher) => matcher.patterns.some((pattern) => pattern.test(path))) ?? null;
  }

  classifyByContent($: cheerio.CheerioAPI, html: string): PageType {
    const text = htmlProcessor.visibleText(html).toLowerCase();

    let bestType = PageType.OTHER;
    let bestScore = 0;

    for (const rule of this.rules) {
      const score =
        this.scoreHeadings($, rule.headings) + this.scoreClasses($, rule.classes) + this.scoreKeywords(text, rule.keywords);

      // Strictly greater: ties keep the earlier rule
      if (score > bestScore) {
        bestScore = score;
        bestType = rule.type;
      }
    }

    return bestScore >= this.minContentScore ? bestType : PageType.OTHER;
  }

  /**
   * Score rule headings (h1 = 3, h2/h3 = 2, h4-h6 = 1 per keyword hit)
   */
  private scoreHeadings($: cheerio.CheerioAPI, keywords: string[]): number {
    let score = 0;

    $('h1, h2, h3, h4, h5, h6').each((_, el) => {
      const heading = $(el);
      const text = heading.text().toLowerCase();
      const weight = HEADING_WEIGHTS[heading.prop('tagName')?.toLowerCase() ?? ''] ?? 1;

      for (const keyword of keywords) {
        if (text.includes(keyword)) {
          score += weight;
        }
      }
    });

    return score;
  }

  private scoreClasses($: cheerio.CheerioAPI, keywords: string[]): number {
    let score = 0;

    $('[class]').each((_, el) => {
      const classText = ($(el).attr('class') ?? '').toLowerCase();
      for (const keyword of keywords) {
        if (classText.includes(keyword)) {
          score++;
        }
      }
    });

    return score;
  }

  private scoreKeywords(text: string, keywords: string[]): number {
    let score = 0;

    for (const keyword of keywords) {
      let count = 0;
      let index = text.indexOf(keyword);
      while (index !== -1 && count < KEYWORD_COUNT_CAP) {
        count++;
        index = text.indexOf(keyword, index + keyword.length);
      }
      score += count;
    }

    return score;
  }

  /**
   * Extract, normalize and filter outbound links, then keep the highest
   * ranked ones. Links of equal rank stay in document order.
   */
  discoverLinks($: cheerio.CheerioAPI, pageUrl: string, context: ClassifyContext): string[] {
    const links: string[] = [];
    const seen = new Set<string>();
    const pageKey = normalizeUrl(pageUrl);
    if (pageKey) {
      seen.add(pageKey);
    }

    $('a[href], area[href]').each((_, el) => {
      const href = $(el).attr('href');
      if (!href || !isCrawlableHref(href)) {
        return;
      }

      const normalized = normalizeUrl(href.trim(), pageUrl);
      if (!normalized || seen.has(normalized)) {
        return;
      }
      seen.add(normalized);

      if (!shouldFollowLink(normalized, pageUrl, context)) {
        return;
      }

      if (context.isKnown && context.isKnown(normalized)) {
        return;
      }

      if (this.isIrrelevantLink(normalized)) {
        return;
      }

      links.push(normalized);
    });

    // Array.prototype.sort is stable
    return links
      .map((url) => ({ url, priority: this.linkPriority(url) }))
      .sort((a, b) => b.priority - a.priority)
      .map((link) => link.url)
      .slice(0, Math.max(0, context.maxLinks));
  }
}

export const pageClassifier = new PageClassifier();
