/**
 * Scraping Types
 * Fetch contracts shared by the fetcher, robots checker and orchestrator
 */

import { FetchFailureKind } from './errors';

/**
 * The subset of the platform fetch the scraper depends on
 */
export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchSuccess {
  ok: true;
  content: string;
  statusCode: number;
  finalUrl: string;
  contentType: string | null;
  attempts: number;
}

export interface FetchFailure {
  kind: FetchFailureKind;
  detail: string;
  statusCode?: number;
  attempts: number;
}

export type FetchOutcome = FetchSuccess | { ok: false; failure: FetchFailure };

export interface FetchRequestOptions {
  /**
   * Per-attempt timeout; defaults to the fetcher's page timeout
   */
  timeoutMs?: number;

  /**
   * Sent as Referer
   */
  referer?: string | null;

  /**
   * Total time for every attempt, backoff and rate-limit wait together.
   * Each attempt's timeout is capped by what is left of it.
   */
  budgetMs?: number;

  /**
   * Once aborted no further attempt starts; the one in flight completes
   */
  signal?: AbortSignal;
}

/**
 * Optional JavaScript rendering capability provided by the host application
 */
export interface PageRenderer {
  render(url: string, signal?: AbortSignal): Promise<string>;
}
