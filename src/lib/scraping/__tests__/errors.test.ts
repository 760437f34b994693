/**
 * Scraping Error Tests
 */

import {
  PermanentFetchError,
  PolicyBlockedError,
  ScrapingErrorType,
  TimeoutError,
  TransientNetworkError,
  calculateRetryDelay,
  classifyError,
  classifyStatus,
  parseRetryAfter,
  shouldRetry,
  toFailureKind,
  withRetry,
} from '../errors';

function fetchFailed(code: string): TypeError {
  return new TypeError('fetch failed', { cause: Object.assign(new Error(`connect ${code}`), { code }) });
}

describe('Scraping errors', () => {
  describe('classifyStatus', () => {
    it('passes 2xx responses', () => {
      expect(classifyStatus(200)).toBeNull();
    });

    it('treats 5xx, 408 and 429 as transient', () => {
      expect(classifyStatus(503)).toBeInstanceOf(TransientNetworkError);
      expect(classifyStatus(408)).toBeInstanceOf(TransientNetworkError);
      expect(classifyStatus(429, '2')).toMatchObject({ statusCode: 429, retryAfter: 2000, retryable: true });
    });

    it('treats other 4xx as permanent', () => {
      const error = classifyStatus(404);
      expect(error).toBeInstanceOf(PermanentFetchError);
      expect(error?.message).toBe('Server responded with 404');
      expect(error?.retryable).toBe(false);
    });
  });

  describe('classifyError', () => {
    it('returns already classified errors unchanged', () => {
      const error = new PolicyBlockedError('blocked');
      expect(classifyError(error)).toBe(error);
    });

    it('reads Node error codes from the cause chain', () => {
      const refused = classifyError(fetchFailed('ECONNREFUSED'));
      expect(refused).toBeInstanceOf(TransientNetworkError);
      expect(refused.message).toBe('Network connection failed (ECONNREFUSED)');

      const dns = classifyError(fetchFailed('ENOTFOUND'));
      expect(dns).toBeInstanceOf(PermanentFetchError);
      expect(dns.message).toBe('DNS lookup failed');

      expect(classifyError(fetchFailed('UND_ERR_CONNECT_TIMEOUT'))).toBeInstanceOf(TimeoutError);
    });

    it('maps aborted requests to timeouts', () => {
      const abort = new Error('This operation was aborted');
      abort.name = 'AbortError';

      const error = classifyError(abort);
      expect(error).toBeInstanceOf(TimeoutError);
      expect(error.cause).toBe(abort);
    });

    it('uses the status code when one is given', () => {
      expect(classifyError(new Error('bad gateway'), 502)).toMatchObject({
        type: ScrapingErrorType.TRANSIENT_NETWORK,
        statusCode: 502,
      });
    });

    it('treats unknown failures as transient', () => {
      expect(classifyError('socket hang up')).toMatchObject({
        type: ScrapingErrorType.TRANSIENT_NETWORK,
        message: 'socket hang up',
      });
    });
  });

  describe('toFailureKind', () => {
    it('maps error types onto fetch failure kinds', () => {
      expect(toFailureKind(new TimeoutError('slow'))).toBe('timeout');
      expect(toFailureKind(new PolicyBlockedError('no'))).toBe('blocked');
      expect(toFailureKind(new PermanentFetchError('gone', { statusCode: 410 }))).toBe('http_error');
      expect(toFailureKind(new TransientNetworkError('reset'))).toBe('network_error');
    });
  });

  describe('parseRetryAfter', () => {
    it('accepts delta seconds and HTTP dates', () => {
      expect(parseRetryAfter('3')).toBe(3000);
      expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT', Date.parse('Wed, 21 Oct 2026 07:27:00 GMT'))).toBe(60000);
    });

    it('ignores missing or unreadable values', () => {
      expect(parseRetryAfter(null)).toBeUndefined();
      expect(parseRetryAfter('soon')).toBeUndefined();
    });
  });

  describe('retry policy', () => {
    it('stops once the retry budget is spent', () => {
      const error = new TransientNetworkError('reset');
      expect(shouldRetry(error, 0, 2)).toBe(true);
      expect(shouldRetry(error, 2, 2)).toBe(false);
      expect(shouldRetry(new PermanentFetchError('gone'), 0, 2)).toBe(false);
    });

    it('backs off exponentially up to a minute', () => {
      const error = new TransientNetworkError('reset');
      expect(calculateRetryDelay(error, 0, 100)).toBe(100);
      expect(calculateRetryDelay(error, 2, 100)).toBe(400);
      expect(calculateRetryDelay(error, 20, 100)).toBe(60000);
    });

    it('prefers the server Retry-After', () => {
      const error = new TransientNetworkError('slow down', { retryAfter: 5000 });
      expect(calculateRetryDelay(error, 3, 100)).toBe(5000);
    });
  });

  describe('withRetry', () => {
    it('retries transient failures until one succeeds', async () => {
      const fn = jest
        .fn<Promise<string>, [number]>()
        .mockRejectedValueOnce(fetchFailed('ECONNRESET'))
        .mockResolvedValueOnce('ok');
      const onRetry = jest.fn();

      await expect(withRetry(fn, { maxRetries: 2, baseDelay: 1, onRetry })).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
      expect(onRetry).toHaveBeenCalledWith(expect.any(TransientNetworkError), 1, 1);
    });

    it('runs maxRetries + 1 times before giving up', async () => {
      const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(fetchFailed('ECONNRESET'));

      await expect(withRetry(fn, { maxRetries: 2, baseDelay: 1 })).rejects.toBeInstanceOf(TransientNetworkError);
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('does not retry permanent failures', async () => {
      const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(new PermanentFetchError('gone'));

      await expect(withRetry(fn, { maxRetries: 3, baseDelay: 1 })).rejects.toThrow('gone');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('stops retrying once the signal is aborted', async () => {
      const controller = new AbortController();
      const fn = jest.fn<Promise<string>, [number]>().mockImplementation(() => {
        controller.abort();
        return Promise.reject(fetchFailed('ECONNRESET'));
      });

      await expect(
        withRetry(fn, { maxRetries: 3, baseDelay: 1, signal: controller.signal })
      ).rejects.toBeInstanceOf(TransientNetworkError);
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('does not wait for a retry that would start past the deadline', async () => {
      const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(fetchFailed('ECONNRESET'));
      const onRetry = jest.fn();

      await expect(
        withRetry(fn, { maxRetries: 3, baseDelay: 100, deadline: Date.now() + 50, onRetry })
      ).rejects.toBeInstanceOf(TransientNetworkError);
      expect(fn).toHaveBeenCalledTimes(1);
      expect(onRetry).not.toHaveBeenCalled();
    });
  });
});
