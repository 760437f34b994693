/**
 * URL Normalization Utilities
 * Functions for normalizing, resolving and filtering URLs
 */

import { LinkFilterConfig } from './crawling.types';

const NON_CONTENT_EXTENSIONS = [
  '.pdf', '.zip', '.jpg', '.jpeg', '.png', '.gif', '.svg', '.webp', '.ico',
  '.css', '.js', '.xml', '.json', '.mp4', '.mp3',
];

const SKIPPED_SCHEMES = ['mailto:', 'tel:', 'javascript:', 'data:', 'sms:'];

/**
 * Normalize a URL by removing fragments, sorting query params, etc.
 * Returns null when the URL cannot be parsed or is not http(s).
 */
export function normalizeUrl(url: string, baseUrl?: string): string | null {
  let urlObj: URL;
  try {
    urlObj = baseUrl ? new URL(url, baseUrl) : new URL(url);
  } catch {
    return null;
  }

  if (urlObj.protocol !== 'http:' && urlObj.protocol !== 'https:') {
    return null;
  }

  // Remove fragment
  urlObj.hash = '';

  // Sort query parameters
  const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) =>
    a.localeCompare(b)
  );
  urlObj.search = '';
  sortedParams.forEach(([key, value]) => {
    urlObj.searchParams.append(key, value);
  });

  // Remove trailing slash (except for root)
  const pathname = urlObj.pathname;
  if (pathname.length > 1 && pathname.endsWith('/')) {
    urlObj.pathname = pathname.slice(0, -1);
  }

  urlObj.hostname = urlObj.hostname.toLowerCase();

  return urlObj.href;
}

/**
 * Extract domain from URL (lowercased, without www.)
 */
export function extractDomain(url: string): string {
  try {
    const urlObj = new URL(url);
    let hostname = urlObj.hostname.toLowerCase();
    if (hostname.startsWith('www.')) {
      hostname = hostname.substring(4);
    }
    return hostname;
  } catch {
    return '';
  }
}

/**
 * Origin (scheme + host + port) of a URL, or '' when unparseable
 */
export function extractOrigin(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return '';
  }
}

/**
 * Check if two URLs are from the same domain
 */
export function isSameDomain(url1: string, url2: string): boolean {
  const domain1 = extractDomain(url1);
  return domain1 !== '' && domain1 === extractDomain(url2);
}

/**
 * Check if a link is external (different domain)
 */
export function isExternalLink(url: string, baseUrl: string): boolean {
  return !isSameDomain(url, baseUrl);
}

/**
 * Whether an href points somewhere a crawler can fetch
 */
export function isCrawlableHref(href: string): boolean {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) {
    return false;
  }
  const lower = trimmed.toLowerCase();
  return !SKIPPED_SCHEMES.some((scheme) => lower.startsWith(scheme));
}

/**
 * Compile regex patterns, reporting the ones that fail to compile
 */
export function compilePatterns(patterns: string[]): { compiled: RegExp[]; invalid: string[] } {
  const compiled: RegExp[] = [];
  const invalid: string[] = [];

  for (const pattern of patterns) {
    try {
      compiled.push(new RegExp(pattern, 'i'));
    } catch {
      invalid.push(pattern);
    }
  }

  return { compiled, invalid };
}

/**
 * Determine if a normalized link should be followed based on config
 */
export function shouldFollowLink(normalizedUrl: string, baseUrl: string, config: LinkFilterConfig): boolean {
  let urlObj: URL;
  try {
    urlObj = new URL(normalizedUrl);
  } catch {
    return false;
  }

  if (!config.followExternalLinks && isExternalLink(normalizedUrl, baseUrl)) {
    return false;
  }

  // Block common non-content URLs
  const pathname = urlObj.pathname.toLowerCase();
  if (NON_CONTENT_EXTENSIONS.some((ext) => pathname.endsWith(ext))) {
    return false;
  }

  const exclude = compilePatterns(config.excludePatterns).compiled;
  if (exclude.some((regex) => regex.test(normalizedUrl))) {
    return false;
  }

  const include = compilePatterns(config.includePatterns).compiled;
  if (include.length > 0 && !include.some((regex) => regex.test(normalizedUrl))) {
    return false;
  }

  return true;
}
