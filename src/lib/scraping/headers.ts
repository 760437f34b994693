/**
 * Request Headers
 * Builds the headers the fetcher sends with every page request
 */

const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.8';

/**
 * Build request headers for an identified crawler
 */
export function buildHeaders(userAgent: string, customHeaders?: Record<string, string>): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': userAgent,
    'Accept': DEFAULT_ACCEPT,
    'Accept-Language': 'en-US,en;q=0.9',
  };

  // Merge custom headers
  if (customHeaders) {
    Object.assign(headers, customHeaders);
  }

  return headers;
}

/**
 * Add referer header
 */
export function withReferer(headers: Record<string, string>, referer: string | null): Record<string, string> {
  if (!referer) {
    return headers;
  }
  return {
    ...headers,
    'Referer': referer,
  };
}

/**
 * Product token of a User-Agent string ("Name/1.0 (...)" → "name"), used for robots.txt groups
 */
export function userAgentToken(userAgent: string): string {
  return userAgent.split(/[\/\s]/)[0].toLowerCase();
}
