/**
 * Domain Rate Limiter Tests
 */

import { DomainRateLimiter } from '../rate-limit.manager';

describe('DomainRateLimiter', () => {
  let limiter: DomainRateLimiter;

  beforeEach(() => {
    limiter = new DomainRateLimiter({ intervalMs: 1000 });
  });

  it('spaces requests to one domain by the interval', () => {
    expect(limiter.reserve('https://tonys.test/', 0)).toEqual({ domain: 'tonys.test', scheduledAt: 0, waitMs: 0 });
    expect(limiter.reserve('https://tonys.test/menu', 100)).toEqual({
      domain: 'tonys.test',
      scheduledAt: 1000,
      waitMs: 900,
    });
    expect(limiter.reserve('https://tonys.test/contact', 200)).toMatchObject({ scheduledAt: 2000, waitMs: 1800 });
  });

  it('does not delay a request after the interval has passed', () => {
    limiter.reserve('https://tonys.test/', 0);
    expect(limiter.reserve('https://tonys.test/menu', 5000).waitMs).toBe(0);
  });

  it('keeps domains independent and ignores www', () => {
    limiter.reserve('https://www.tonys.test/', 0);

    expect(limiter.reserve('https://luigis.test/', 0).waitMs).toBe(0);
    expect(limiter.reserve('https://TONYS.test/menu', 0).waitMs).toBe(1000);
  });

  it('applies per-domain intervals', () => {
    limiter.setDomainInterval('https://tonys.test/', 200);

    expect(limiter.getInterval('tonys.test')).toBe(200);
    expect(limiter.getInterval('luigis.test')).toBe(1000);
    limiter.reserve('https://tonys.test/', 0);
    expect(limiter.reserve('https://tonys.test/menu', 0).waitMs).toBe(200);
  });

  it('tracks delayed requests', () => {
    limiter.reserve('https://tonys.test/', 0);
    limiter.reserve('https://tonys.test/menu', 100);
    limiter.reserve('https://luigis.test/', 100);

    expect(limiter.getStats()).toEqual({ totalRequests: 3, delayedRequests: 1, totalWaitMs: 900, activeKeys: 2 });
  });

  it('waits for its slot', async () => {
    jest.useFakeTimers();
    try {
      const fast = new DomainRateLimiter({ intervalMs: 50 });
      await fast.acquire('https://tonys.test/');

      let released = false;
      const pending = fast.acquire('https://tonys.test/menu').then(() => {
        released = true;
      });

      await jest.advanceTimersByTimeAsync(49);
      expect(released).toBe(false);
      await jest.advanceTimersByTimeAsync(1);
      await pending;
      expect(released).toBe(true);
    } finally {
      jest.useRealTimers();
    }
  });
});
