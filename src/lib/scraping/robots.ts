/**
 * Robots.txt Policy
 *
 * Policy rules:
 * 1. Use the group for our User-agent token when present, otherwise `User-agent: *`
 * 2. Longest matching Allow/Disallow path wins; Allow wins a tie
 * 3. robots.txt that cannot be fetched (error, non-200) allows everything
 * 4. Cache parsed rules per origin for the lifetime of the checker
 * 5. Crawl-delay is exposed so callers can widen the per-domain interval
 */

import { extractOrigin } from '../crawling/url-normalizer';
import { buildHeaders, userAgentToken } from './headers';
import { FetchImpl } from './scraping.types';

interface RobotsGroup {
  allow: string[];
  disallow: string[];
  crawlDelay: number | null;
}

/**
 * Parsed robots.txt rules for an origin, keyed by lowercased agent token
 */
interface RobotsRules {
  groups: Map<string, RobotsGroup>;
}

export interface RobotsCheckerOptions {
  /** User-Agent header; its product token selects the rule group */
  userAgent: string;
  /** Request timeout in ms (default: 10000) */
  fetchTimeoutMs?: number;
  fetchImpl?: FetchImpl;
}

const EMPTY_RULES: RobotsRules = {
  groups: new Map(),
};

/**
 * Parse robots.txt content.
 * Consecutive User-agent lines share the group that follows them.
 */
export function parseRobotsTxt(text: string): Map<string, RobotsGroup> {
  const groups = new Map<string, RobotsGroup>();
  let currentAgents: string[] = [];
  let lastDirectiveWasAgent = false;

  const groupFor = (agent: string): RobotsGroup => {
    let group = groups.get(agent);
    if (!group) {
      group = { allow: [], disallow: [], crawlDelay: null };
      groups.set(agent, group);
    }
    return group;
  };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) continue;

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) continue;

    const directive = line.slice(0, colonIndex).trim().toLowerCase();
    const value = line.slice(colonIndex + 1).trim();

    if (directive === 'user-agent') {
      const agent = value.toLowerCase();
      currentAgents = lastDirectiveWasAgent ? [...currentAgents, agent] : [agent];
      groupFor(agent);
      lastDirectiveWasAgent = true;
      continue;
    }

    lastDirectiveWasAgent = false;

    for (const agent of currentAgents) {
      const group = groupFor(agent);
      if (directive === 'allow' && value) {
        group.allow.push(value);
      } else if (directive === 'disallow' && value) {
        // Empty disallow = allow all
        group.disallow.push(value);
      } else if (directive === 'crawl-delay') {
        const delay = parseFloat(value);
        if (!isNaN(delay) && delay >= 0) {
          group.crawlDelay = delay;
        }
      }
    }
  }

  return groups;
}

/**
 * Longest-match decision for one path
 */
export function isPathAllowed(path: string, group: RobotsGroup | undefined): boolean {
  if (!group) {
    return true;
  }

  const longest = (rules: string[]): number =>
    rules.reduce((best, rule) => (path.startsWith(rule) && rule.length > best ? rule.length : best), -1);

  const allow = longest(group.allow);
  const disallow = longest(group.disallow);

  if (disallow === -1) {
    return true;
  }
  return allow >= disallow;
}

export class RobotsChecker {
  private readonly agent: string;
  private readonly userAgent: string;
  private readonly fetchTimeoutMs: number;
  private readonly fetchImpl: FetchImpl;
  private readonly cache = new Map<string, Promise<RobotsRules>>();

  constructor(options: RobotsCheckerOptions) {
    this.userAgent = options.userAgent;
    this.agent = userAgentToken(options.userAgent);
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 10000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Check if URL is allowed by robots.txt
   */
  async isAllowed(url: string): Promise<boolean> {
    const origin = extractOrigin(url);
    if (!origin) {
      return true;
    }

    const rules = await this.getRules(origin);
    const urlObj = new URL(url);
    return isPathAllowed(urlObj.pathname + urlObj.search, this.selectGroup(rules));
  }

  /**
   * Crawl-delay for an origin in milliseconds, or null if not specified
   */
  async getCrawlDelayMs(url: string): Promise<number | null> {
    const origin = extractOrigin(url);
    if (!origin) {
      return null;
    }

    const group = this.selectGroup(await this.getRules(origin));
    return group && group.crawlDelay !== null ? group.crawlDelay * 1000 : null;
  }

  /**
   * Number of origins with cached rules
   */
  cacheSize(): number {
    return this.cache.size;
  }

  private selectGroup(rules: RobotsRules): RobotsGroup | undefined {
    return rules.groups.get(this.agent) ?? rules.groups.get('*');
  }

  /**
   * Get rules for an origin; concurrent callers share one request
   */
  private getRules(origin: string): Promise<RobotsRules> {
    let pending = this.cache.get(origin);
    if (!pending) {
      pending = this.fetchRules(origin);
      this.cache.set(origin, pending);
    }
    return pending;
  }

  private async fetchRules(origin: string): Promise<RobotsRules> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.fetchTimeoutMs);

    try {
      const response = await this.fetchImpl(`${origin}/robots.txt`, {
        method: 'GET',
        headers: buildHeaders(this.userAgent, { Accept: 'text/plain' }),
        redirect: 'follow',
        signal: controller.signal,
      });

      if (response.status !== 200) {
        return EMPTY_RULES;
      }

      return {
        groups: parseRobotsTxt(await response.text()),
      };
    } catch (error: unknown) {
      // Fail-open: an unreachable robots.txt allows everything
      console.warn(`robots.txt for ${origin} unavailable: ${error instanceof Error ? error.message : String(error)}`);
      return EMPTY_RULES;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
