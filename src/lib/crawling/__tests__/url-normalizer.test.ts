/**
 * URL Normalizer Tests
 */

import {
  normalizeUrl,
  extractDomain,
  isSameDomain,
  isCrawlableHref,
  compilePatterns,
  shouldFollowLink,
} from '../url-normalizer';
import { LinkFilterConfig } from '../crawling.types';

const filter: LinkFilterConfig = {
  maxLinks: 10,
  followExternalLinks: false,
  includePatterns: [],
  excludePatterns: [],
};

describe('normalizeUrl', () => {
  it('should drop fragments, sort query params and strip trailing slash', () => {
    expect(normalizeUrl('HTTPS://Tonys.TEST/Menu/?b=2&a=1#dinner')).toBe('https://tonys.test/Menu?a=1&b=2');
  });

  it('should keep the root slash', () => {
    expect(normalizeUrl('https://tonys.test')).toBe('https://tonys.test/');
  });

  it('should resolve relative URLs against a base', () => {
    expect(normalizeUrl('../contact', 'https://tonys.test/menu/lunch')).toBe('https://tonys.test/contact');
  });

  it('should reject non-http protocols and garbage', () => {
    expect(normalizeUrl('ftp://tonys.test/file')).toBeNull();
    expect(normalizeUrl('not a url')).toBeNull();
  });
});

describe('extractDomain', () => {
  it('should lowercase and strip www', () => {
    expect(extractDomain('https://www.Tonys.test/menu')).toBe('tonys.test');
  });

  it('should return empty string for invalid URLs', () => {
    expect(extractDomain('nope')).toBe('');
  });
});

describe('isSameDomain', () => {
  it('should treat www and bare host as the same site', () => {
    expect(isSameDomain('https://www.tonys.test/', 'https://tonys.test/menu')).toBe(true);
    expect(isSameDomain('https://tonys.test/', 'https://other.test/')).toBe(false);
  });
});

describe('isCrawlableHref', () => {
  it('should skip non-page schemes and fragment links', () => {
    expect(isCrawlableHref('mailto:info@tonys.test')).toBe(false);
    expect(isCrawlableHref('tel:5551234')).toBe(false);
    expect(isCrawlableHref('javascript:void(0)')).toBe(false);
    expect(isCrawlableHref('#top')).toBe(false);
    expect(isCrawlableHref('  ')).toBe(false);
    expect(isCrawlableHref('/menu')).toBe(true);
  });
});

describe('compilePatterns', () => {
  it('should report invalid patterns', () => {
    const result = compilePatterns(['/menu', '(unclosed']);
    expect(result.compiled).toHaveLength(1);
    expect(result.invalid).toEqual(['(unclosed']);
  });
});

describe('shouldFollowLink', () => {
  const base = 'https://tonys.test/';

  it('should reject external links unless enabled', () => {
    expect(shouldFollowLink('https://other.test/page', base, filter)).toBe(false);
    expect(shouldFollowLink('https://other.test/page', base, { ...filter, followExternalLinks: true })).toBe(true);
  });

  it('should reject non-content extensions', () => {
    expect(shouldFollowLink('https://tonys.test/menu.pdf', base, filter)).toBe(false);
    expect(shouldFollowLink('https://tonys.test/logo.PNG', base, filter)).toBe(false);
  });

  it('should apply exclude before include', () => {
    const config = { ...filter, includePatterns: ['/menu'], excludePatterns: ['/menu/archive'] };

    expect(shouldFollowLink('https://tonys.test/menu', base, config)).toBe(true);
    expect(shouldFollowLink('https://tonys.test/menu/archive', base, config)).toBe(false);
    expect(shouldFollowLink('https://tonys.test/contact', base, config)).toBe(false);
  });
});
