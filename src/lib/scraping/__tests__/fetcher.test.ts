/**
 * Fetcher Tests
 */

import { DomainRateLimiter } from '../../rate-limit';
import { Fetcher, FetcherOptions } from '../fetcher';
import { RobotsChecker } from '../robots';
import { FetchImpl } from '../scraping.types';
import { createFakeFetch, FakeRouteTable } from '../../../__tests__/helpers/mocks';

const HOME = 'https://tonys.test/';
const MENU = 'https://tonys.test/menu';
const USER_AGENT = 'MultipageEntityScraper/1.0';

function buildFetcher(fetchImpl: FetchImpl, overrides: Partial<FetcherOptions> = {}): Fetcher {
  return new Fetcher({
    rateLimiter: new DomainRateLimiter({ intervalMs: 0 }),
    fetchImpl,
    userAgent: USER_AGENT,
    pageTimeoutMs: 1000,
    maxRetries: 2,
    retryBaseDelayMs: 1,
    ...overrides,
  });
}

describe('Fetcher', () => {
  it('returns the page body and status', async () => {
    const fake = createFakeFetch({ [HOME]: { body: '<h1>Tony</h1>' } });

    const outcome = await buildFetcher(fake.fetchImpl).fetch(HOME);

    expect(outcome).toEqual({
      ok: true,
      content: '<h1>Tony</h1>',
      statusCode: 200,
      finalUrl: HOME,
      contentType: 'text/html; charset=utf-8',
      attempts: 1,
    });
  });

  it('reports where a redirect ended', async () => {
    const fake = createFakeFetch({ [MENU]: { body: 'menu', redirectTo: 'https://tonys.test/menus/dinner' } });

    const outcome = await buildFetcher(fake.fetchImpl).fetch(MENU);

    expect(outcome.ok && outcome.finalUrl).toBe('https://tonys.test/menus/dinner');
  });

  it('sends identifying headers and the referer', async () => {
    const seen: RequestInit[] = [];
    const fake = createFakeFetch({ [MENU]: { body: 'menu' } });
    const fetchImpl: FetchImpl = (input, init) => {
      if (init) {
        seen.push(init);
      }
      return fake.fetchImpl(input, init);
    };

    await buildFetcher(fetchImpl).fetch(MENU, { referer: HOME });

    expect(seen[0].headers).toMatchObject({ 'User-Agent': USER_AGENT, Referer: HOME });
  });

  it('retries a transient server error', async () => {
    const fake = createFakeFetch({ [HOME]: [{ status: 503 }, { body: 'back' }] });

    const outcome = await buildFetcher(fake.fetchImpl).fetch(HOME);

    expect(outcome).toMatchObject({ ok: true, content: 'back', attempts: 2 });
    expect(fake.callCount(HOME)).toBe(2);
  });

  it('honours Retry-After on 429', async () => {
    const fake = createFakeFetch({ [HOME]: [{ status: 429, headers: { 'retry-after': '0' } }, { body: 'ok' }] });

    const outcome = await buildFetcher(fake.fetchImpl).fetch(HOME);

    expect(outcome.ok).toBe(true);
    expect(console.warn).toHaveBeenCalledWith(`Fetch ${HOME}: attempt 1 failed (Rate limited by server), retrying in 0ms`);
  });

  it('gives up on a 404 without retrying', async () => {
    const fake = createFakeFetch({});

    const outcome = await buildFetcher(fake.fetchImpl).fetch(MENU);

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: 'http_error', detail: 'Server responded with 404', statusCode: 404, attempts: 1 },
    });
  });

  it('stops after maxRetries + 1 attempts on a refused connection', async () => {
    const fake = createFakeFetch({ [HOME]: { error: 'refused' } });

    const outcome = await buildFetcher(fake.fetchImpl).fetch(HOME);

    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'network_error', detail: 'Network connection failed (ECONNREFUSED)', attempts: 3 },
    });
    expect(fake.callCount(HOME)).toBe(3);
  });

  it('times out a hanging request on every attempt', async () => {
    const fake = createFakeFetch({ [HOME]: { hang: true } });

    const outcome = await buildFetcher(fake.fetchImpl, { maxRetries: 1 }).fetch(HOME, { timeoutMs: 20 });

    expect(outcome).toMatchObject({ ok: false, failure: { kind: 'timeout', detail: 'Request timed out', attempts: 2 } });
  });

  it('caps attempts at the remaining time budget', async () => {
    const fake = createFakeFetch({ [HOME]: { hang: true } });
    const started = Date.now();

    const outcome = await buildFetcher(fake.fetchImpl, { maxRetries: 3, retryBaseDelayMs: 5 }).fetch(HOME, {
      timeoutMs: 1000,
      budgetMs: 30,
    });

    expect(outcome).toMatchObject({ ok: false, failure: { kind: 'timeout', attempts: 1 } });
    expect(fake.callCount(HOME)).toBe(1);
    expect(Date.now() - started).toBeLessThan(500);
  });

  it('abandons a request and its retries when cancelled', async () => {
    const controller = new AbortController();
    const fake = createFakeFetch({ [HOME]: { hang: true } });
    const fetchImpl: FetchImpl = (input, init) => {
      setTimeout(() => controller.abort(), 10);
      return fake.fetchImpl(input, init);
    };
    const started = Date.now();

    const outcome = await buildFetcher(fetchImpl, { maxRetries: 3 }).fetch(HOME, {
      timeoutMs: 1000,
      signal: controller.signal,
    });

    expect(outcome).toMatchObject({ ok: false, failure: { kind: 'timeout', attempts: 1 } });
    expect(fake.callCount(HOME)).toBe(1);
    expect(Date.now() - started).toBeLessThan(500);
  });

  it('sends nothing once already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const fake = createFakeFetch({ [HOME]: { body: 'home' } });

    const outcome = await buildFetcher(fake.fetchImpl).fetch(HOME, { signal: controller.signal });

    expect(outcome).toEqual({
      ok: false,
      failure: { kind: 'timeout', detail: 'Request cancelled', statusCode: undefined, attempts: 0 },
    });
    expect(fake.calls).toHaveLength(0);
  });

  it('rejects malformed URLs without a request', async () => {
    const fake = createFakeFetch({});

    const outcome = await buildFetcher(fake.fetchImpl).fetch('ftp://tonys.test/menu');

    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'network_error', detail: 'Malformed URL: ftp://tonys.test/menu', attempts: 0 },
    });
    expect(fake.calls).toHaveLength(0);
  });

  describe('robots.txt', () => {
    const routes: FakeRouteTable = {
      'https://tonys.test/robots.txt': { body: 'User-agent: *\nDisallow: /private\nCrawl-delay: 5' },
      [HOME]: { body: 'home' },
    };

    it('blocks disallowed paths before fetching them', async () => {
      const fake = createFakeFetch(routes);
      const robots = new RobotsChecker({ userAgent: USER_AGENT, fetchImpl: fake.fetchImpl });

      const outcome = await buildFetcher(fake.fetchImpl, { robots }).fetch('https://tonys.test/private');

      expect(outcome).toMatchObject({
        ok: false,
        failure: { kind: 'blocked', detail: 'Disallowed by robots.txt: https://tonys.test/private', attempts: 0 },
      });
      expect(fake.callCount('https://tonys.test/private')).toBe(0);
    });

    it('widens the domain interval to the Crawl-delay', async () => {
      const fake = createFakeFetch(routes);
      const robots = new RobotsChecker({ userAgent: USER_AGENT, fetchImpl: fake.fetchImpl });
      const rateLimiter = new DomainRateLimiter({ intervalMs: 0 });

      const outcome = await buildFetcher(fake.fetchImpl, { robots, rateLimiter }).fetch(HOME);

      expect(outcome.ok).toBe(true);
      expect(rateLimiter.getInterval('tonys.test')).toBe(5000);
    });
  });
});
