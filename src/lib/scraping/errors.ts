/**
 * Scraping Error Handling
 * Error taxonomy, classification of raw network failures, and retry strategy
 */

export enum ScrapingErrorType {
  TRANSIENT_NETWORK = 'TRANSIENT_NETWORK',
  PERMANENT_FETCH = 'PERMANENT_FETCH',
  TIMEOUT = 'TIMEOUT',
  POLICY_BLOCKED = 'POLICY_BLOCKED',
  EXTRACTION = 'EXTRACTION',
  CONFIGURATION = 'CONFIGURATION',
}

/**
 * Failure kinds surfaced by the fetcher
 */
export type FetchFailureKind = 'timeout' | 'http_error' | 'network_error' | 'blocked';

export interface ScrapingErrorOptions {
  statusCode?: number;
  retryAfter?: number; // milliseconds
  cause?: unknown;
}

/**
 * Base class for every classified failure
 */
export class ScrapingError extends Error {
  readonly type: ScrapingErrorType;
  readonly retryable: boolean;
  readonly statusCode?: number;
  readonly retryAfter?: number;

  constructor(
    type: ScrapingErrorType,
    message: string,
    retryable: boolean,
    options: ScrapingErrorOptions = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.type = type;
    this.retryable = retryable;
    this.statusCode = options.statusCode;
    this.retryAfter = options.retryAfter;
  }
}

/** Connection resets, refused connections, 5xx, 408 and 429 responses */
export class TransientNetworkError extends ScrapingError {
  constructor(message: string, options: ScrapingErrorOptions = {}) {
    super(ScrapingErrorType.TRANSIENT_NETWORK, message, true, options);
  }
}

/** 404 and other 4xx responses, DNS failures, malformed URLs */
export class PermanentFetchError extends ScrapingError {
  constructor(message: string, options: ScrapingErrorOptions = {}) {
    super(ScrapingErrorType.PERMANENT_FETCH, message, false, options);
  }
}

/**
 * A page attempt that exceeded its timeout. The fetcher retries it like any
 * other transient failure; once attempts run out it is recorded as-is.
 */
export class TimeoutError extends ScrapingError {
  constructor(message: string, options: ScrapingErrorOptions = {}) {
    super(ScrapingErrorType.TIMEOUT, message, true, options);
  }
}

/** robots.txt disallow or pattern exclusion */
export class PolicyBlockedError extends ScrapingError {
  constructor(message: string, options: ScrapingErrorOptions = {}) {
    super(ScrapingErrorType.POLICY_BLOCKED, message, false, options);
  }
}

/** Malformed content; degrades to an empty field map */
export class ExtractionError extends ScrapingError {
  constructor(message: string, options: ScrapingErrorOptions = {}) {
    super(ScrapingErrorType.EXTRACTION, message, false, options);
  }
}

/**
 * Invalid configuration. The only error allowed to fail a batch run.
 */
export class ConfigurationError extends ScrapingError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(ScrapingErrorType.CONFIGURATION, `Invalid configuration: ${issues.join('; ')}`, false);
    this.issues = issues;
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'EPIPE',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const PERMANENT_CODES = new Set(['ENOTFOUND', 'ERR_INVALID_URL', 'ERR_INVALID_PROTOCOL']);

/**
 * Walk an error and its causes looking for a Node/undici error code
 */
function findErrorCode(error: unknown, depth: number = 0): string | undefined {
  if (typeof error !== 'object' || error === null || depth > 3) {
    return undefined;
  }
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if ('cause' in error) {
    return findErrorCode(error.cause, depth + 1);
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(header: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!header) {
    return undefined;
  }

  const seconds = Number(header.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(header);
  if (!isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

/**
 * Classify an HTTP status code. Returns null for success statuses.
 */
export function classifyStatus(statusCode: number, retryAfterHeader?: string | null): ScrapingError | null {
  if (statusCode >= 200 && statusCode < 300) {
    return null;
  }

  if (statusCode === 429) {
    return new TransientNetworkError('Rate limited by server', {
      statusCode,
      retryAfter: parseRetryAfter(retryAfterHeader),
    });
  }

  if (statusCode === 408 || statusCode >= 500) {
    return new TransientNetworkError(`Server responded with ${statusCode}`, { statusCode });
  }

  return new PermanentFetchError(`Server responded with ${statusCode}`, { statusCode });
}

/**
 * Classify a raw error thrown while fetching
 */
export function classifyError(error: unknown, statusCode?: number): ScrapingError {
  if (error instanceof ScrapingError) {
    return error;
  }

  if (statusCode !== undefined) {
    const byStatus = classifyStatus(statusCode);
    if (byStatus) {
      return byStatus;
    }
  }

  const message = errorMessage(error);

  // Abort via timeout signal
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new TimeoutError('Request timed out', { cause: error });
  }

  const code = findErrorCode(error);
  if (code && PERMANENT_CODES.has(code)) {
    return new PermanentFetchError(code === 'ENOTFOUND' ? 'DNS lookup failed' : message, { cause: error });
  }
  if (code && TRANSIENT_CODES.has(code)) {
    if (code.includes('TIMEOUT') || code === 'ETIMEDOUT' || code === 'ESOCKETTIMEDOUT') {
      return new TimeoutError(`Request timed out (${code})`, { cause: error });
    }
    return new TransientNetworkError(`Network connection failed (${code})`, { cause: error });
  }

  if (message.includes('Invalid URL') || message.includes('unsupported protocol')) {
    return new PermanentFetchError(message, { cause: error });
  }

  if (message.includes('timeout') || message.includes('timed out')) {
    return new TimeoutError('Request timed out', { cause: error });
  }

  // Unknown failures from the network layer get the benefit of the doubt
  return new TransientNetworkError(message || 'Network request failed', { cause: error });
}

/**
 * Map a classified error onto the fetcher's failure kinds
 */
export function toFailureKind(error: ScrapingError): FetchFailureKind {
  switch (error.type) {
    case ScrapingErrorType.TIMEOUT:
      return 'timeout';
    case ScrapingErrorType.POLICY_BLOCKED:
      return 'blocked';
    case ScrapingErrorType.TRANSIENT_NETWORK:
    case ScrapingErrorType.PERMANENT_FETCH:
      return error.statusCode !== undefined ? 'http_error' : 'network_error';
    default:
      return 'network_error';
  }
}

/**
 * Determine if we should retry based on error
 */
export function shouldRetry(error: ScrapingError, attemptCount: number, maxRetries: number): boolean {
  if (attemptCount >= maxRetries) return false;
  return error.retryable;
}

const MAX_RETRY_DELAY_MS = 60000;

/**
 * Calculate retry delay with exponential backoff
 */
export function calculateRetryDelay(
  error: ScrapingError,
  attemptCount: number,
  baseDelay: number = 1000
): number {
  // Server-provided Retry-After wins
  if (error.retryAfter !== undefined) {
    return Math.min(error.retryAfter, MAX_RETRY_DELAY_MS);
  }

  return Math.min(baseDelay * Math.pow(2, attemptCount), MAX_RETRY_DELAY_MS);
}

export interface RetryOptions {
  maxRetries?: number;
  baseDelay?: number;

  /**
   * No retry is started once this is aborted
   */
  signal?: AbortSignal;

  /**
   * Epoch ms; no retry is started that would begin at or after it
   */
  deadline?: number;

  onRetry?: (error: ScrapingError, attempt: number, delayMs: number) => void;
}

/**
 * Retry wrapper for async functions. `maxRetries` counts retries, so the
 * function runs at most `maxRetries + 1` times.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { maxRetries = 3, baseDelay = 1000, signal, deadline = Number.POSITIVE_INFINITY, onRetry } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error: unknown) {
      const classified = classifyError(error);

      if (!shouldRetry(classified, attempt, maxRetries)) {
        throw classified;
      }

      const delay = calculateRetryDelay(classified, attempt, baseDelay);
      if (signal?.aborted || Date.now() + delay >= deadline) {
        throw classified;
      }

      if (onRetry) {
        onRetry(classified, attempt + 1, delay);
      }

      await sleep(delay);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
