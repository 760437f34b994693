/**
 * Heuristic Matchers
 * Pattern and keyword matchers over visible text and common DOM structures
 */

import * as cheerio from 'cheerio';
import type { AnyNode } from 'domhandler';
import { cleanText, collapseWhitespace } from '../../processing';
import { ExtractionContext, FieldDefinition, FieldFormat } from '../extraction.types';
import { digitsOf } from '../normalizers';
import vocabulary from './heuristic-vocabulary.json';

export interface HeuristicContext extends ExtractionContext {
  lines: string[];
}

export type HeuristicMatcher = (context: HeuristicContext, field: FieldDefinition) => string[];

const PHONE_PATTERN = /(?:\+?1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}\b/g;
const LABELED_PHONE_PATTERN = /(?:\+?1[-.\s]?)?(?:\(?\d{3}\)?[-.\s]?)?\d{3}[-.\s]?\d{4}\b/;
const EMAIL_PATTERN = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/gi;
const FULL_ADDRESS_PATTERN = /\b\d{1,6}\s+[A-Za-z0-9 .'#-]+?,\s*[A-Za-z .'-]+,?\s*[A-Z]{2}\s*\d{5}(?:-\d{4})?\b/;
const STREET_ADDRESS_PATTERN =
  /\b\d{1,6}\s+(?:[A-Za-z0-9.'-]+\s+){0,4}?(?:Street|St|Avenue|Ave|Road|Rd|Boulevard|Blvd|Drive|Dr|Lane|Ln|Way|Court|Ct|Place|Pl|Parkway|Pkwy|Highway|Hwy)\b\.?/;
const DAY_PATTERN = /\b(?:mon|tue|wed|thu|fri|sat|sun)[a-z]*\b|\bdaily\b|\bevery day\b/i;
const TIME_PATTERN = /\b\d{1,2}(?::\d{2})?\s*(?:am|pm)\b|\b\d{1,2}:\d{2}\b|\bnoon\b|\bmidnight\b/i;
const PRICE_TOKEN_PATTERN = /(?:^|[\s(:])(\${1,4})(?=$|[\s).,])/;
const TRAILING_PRICE = /\s*[$€£]\s*\d+(?:[.,]\d{2})?.*$/;
const TITLE_SEPARATOR = /\s+[|\-–—:·]\s+/;
const MAX_HOURS_LINES = 7;

const BLOCK_SELECTOR = 'p, div, li, h1, h2, h3, h4, h5, h6, tr, dt, dd, section, article';
const NON_CONTENT_ANCESTORS = 'nav, header, footer, [role="navigation"]';

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Text of an element split into visual lines
 */
export function elementLines($: cheerio.CheerioAPI, el: AnyNode): string[] {
  const node = $(el).clone();
  node.find('script, style, noscript').remove();
  node.find('br').replaceWith('\n');
  node.find(BLOCK_SELECTOR).append('\n');
  return cleanText(node.text())
    .split('\n')
    .filter(Boolean);
}

function firstTexts($: cheerio.CheerioAPI, selectors: string[], maxLength: number): string[] {
  const values: string[] = [];

  for (const selector of selectors) {
    $(selector).each((_, el) => {
      const text = collapseWhitespace($(el).text());
      if (text && text.length <= maxLength) {
        values.push(text);
      }
    });
  }

  return values;
}

/**
 * "Label: value" occurrences for the field's labels
 */
export function matchLabeled(context: HeuristicContext, field: FieldDefinition): string[] {
  const labels = field.labels ?? [field.name.replace(/_/g, ' ')];
  const values: string[] = [];

  for (const label of labels) {
    const pattern = new RegExp(`(?:^|\\b)${escapeRegex(label)}\\s*:\\s*(.+)$`, 'i');
    for (const line of context.lines) {
      const match = line.match(pattern);
      if (match && match[1].trim()) {
        values.push(match[1].trim());
      }
    }
  }

  return values;
}

function isExcludedName(text: string): boolean {
  const lower = text.toLowerCase();
  return vocabulary.excludedNamePhrases.some((phrase) => lower.includes(phrase));
}

function isGenericTitle(text: string): boolean {
  return vocabulary.genericTitles.includes(text.trim().toLowerCase());
}

/**
 * First title segment that is not a generic page word ("Menu | Tony's" → "Tony's")
 */
export function nameFromTitle(title: string): string | null {
  const parts = collapseWhitespace(title)
    .split(TITLE_SEPARATOR)
    .map((part) => part.trim())
    .filter(Boolean);

  return parts.find((part) => !isGenericTitle(part) && part.length <= 100) ?? null;
}

/**
 * Title, then h1, then name-like classes, then og:title / og:site_name
 */
export const matchName: HeuristicMatcher = (context) => {
  const { $ } = context;
  const values: string[] = [];

  const fromTitle = nameFromTitle($('title').first().text());
  if (fromTitle) {
    values.push(fromTitle);
  }

  $('h1').each((_, el) => {
    const text = collapseWhitespace($(el).text());
    if (text && text.length <= 100 && !isExcludedName(text)) {
      values.push(text);
    }
  });

  values.push(...firstTexts($, vocabulary.nameSelectors, 100));

  for (const property of ['og:site_name', 'og:title']) {
    const content = $(`meta[property="${property}"]`).attr('content');
    const fromMeta = content ? nameFromTitle(content) : null;
    if (fromMeta) {
      values.push(fromMeta);
    }
  }

  return values;
};

export const matchPhone: HeuristicMatcher = (context, field) => {
  const values: string[] = [];

  for (const labeled of matchLabeled(context, field)) {
    const match = labeled.match(LABELED_PHONE_PATTERN);
    if (match) {
      values.push(match[0]);
    }
  }

  for (const line of context.lines) {
    for (const match of line.matchAll(PHONE_PATTERN)) {
      if (digitsOf(match[0]).length >= 10) {
        values.push(match[0]);
      }
    }
  }

  return values;
};

export const matchEmail: HeuristicMatcher = (context, field) => {
  const values: string[] = [];

  for (const labeled of matchLabeled(context, field)) {
    values.push(...(labeled.match(EMAIL_PATTERN) ?? []));
  }
  for (const line of context.lines) {
    values.push(...(line.match(EMAIL_PATTERN) ?? []));
  }

  return values;
};

export const matchAddress: HeuristicMatcher = (context, field) => {
  const { $ } = context;
  const values = [...matchLabeled(context, field)];

  $('[class*="address"], [class*="location"], [id*="address"]').each((_, el) => {
    const lines = elementLines($, el).filter((line) => /\d/.test(line) && !line.includes('@'));
    const text = lines.join(', ');
    if (text && text.length <= 200 && STREET_ADDRESS_PATTERN.test(text)) {
      values.push(text);
    }
  });

  for (const line of context.lines) {
    const full = line.match(FULL_ADDRESS_PATTERN);
    if (full) {
      values.push(full[0]);
      continue;
    }
    const street = line.match(STREET_ADDRESS_PATTERN);
    if (street) {
      values.push(street[0]);
    }
  }

  return values;
};

function hoursLines(lines: string[]): string[] {
  return lines.filter((line) => TIME_PATTERN.test(line) && (DAY_PATTERN.test(line) || /\bhours?\b/i.test(line)));
}

export const matchHours: HeuristicMatcher = (context, field) => {
  const { $ } = context;
  const values = [...matchLabeled(context, field).filter((value) => TIME_PATTERN.test(value))];

  $('[class*="hour"], [id*="hour"]').each((_, el) => {
    const lines = elementLines($, el).filter((line) => TIME_PATTERN.test(line));
    if (lines.length > 0) {
      values.push(lines.slice(0, MAX_HOURS_LINES).join('; '));
    }
  });

  const fromText = hoursLines(context.lines);
  if (fromText.length > 0) {
    values.push(fromText.slice(0, MAX_HOURS_LINES).join('; '));
  }

  return values;
};

export const matchPriceRange: HeuristicMatcher = (context, field) => {
  const { $ } = context;
  const values = [...matchLabeled(context, field)];

  values.push(...firstTexts($, ['[class*="price-range"]', '[class*="pricerange"]'], 40));

  for (const line of context.lines) {
    if (!/price/i.test(line)) {
      continue;
    }
    const token = line.match(PRICE_TOKEN_PATTERN);
    if (token) {
      values.push(token[1]);
    }
  }

  return values;
};

/**
 * Cuisine words in the title, description and headings; up to three, joined
 */
export const matchCuisine: HeuristicMatcher = (context, field) => {
  const { $ } = context;
  const labeled = matchLabeled(context, field);
  if (labeled.length > 0) {
    return labeled;
  }

  const haystack = [
    $('title').first().text(),
    $('meta[name="description"]').attr('content') ?? '',
    $('meta[property="og:description"]').attr('content') ?? '',
    ...$('h1, h2, h3')
      .toArray()
      .map((el) => $(el).text()),
  ].join(' \n ');

  const found = vocabulary.cuisines.filter((cuisine) =>
    new RegExp(`(?:^|[^a-z])${escapeRegex(cuisine.toLowerCase())}(?:$|[^a-z])`).test(haystack.toLowerCase())
  );

  return found.length > 0 ? [found.slice(0, 3).join(', ')] : [];
};

/**
 * Menu item names from item-like blocks outside navigation
 */
export const matchMenuItems: HeuristicMatcher = (context) => {
  const { $ } = context;
  const values: string[] = [];

  $(vocabulary.menuItemSelectors.join(', ')).each((_, el) => {
    const item = $(el);
    if (item.closest(NON_CONTENT_ANCESTORS).length > 0) {
      return;
    }

    const named = item.find(vocabulary.menuItemNameSelectors.join(', ')).first();
    const raw = named.length > 0 ? named.text() : elementLines($, el)[0] ?? '';
    const name = collapseWhitespace(raw).replace(TRAILING_PRICE, '').trim();

    if (name && name.length <= 100) {
      values.push(name);
    }
  });

  return values;
};

export const matchSocialLinks: HeuristicMatcher = (context) => {
  const { $ } = context;
  const values: string[] = [];

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href') ?? '';
    let url: URL;
    try {
      url = new URL(href, context.url);
    } catch {
      return;
    }

    const host = url.hostname.toLowerCase().replace(/^www\./, '');
    const isSocial = vocabulary.socialDomains.some((domain) => host === domain || host.endsWith(`.${domain}`));
    if (isSocial && !/share|intent/i.test(url.pathname)) {
      values.push(url.href);
    }
  });

  return values;
};

/**
 * Labeled text, then elements whose class or id carries the field name
 */
export const matchGeneric: HeuristicMatcher = (context, field) => {
  const { $ } = context;
  const values = [...matchLabeled(context, field)];
  const token = field.name.replace(/_/g, '-').toLowerCase();

  values.push(...firstTexts($, [`[class*="${token}"]`, `[id*="${token}"]`], 200));
  return values;
};

/**
 * Matchers dedicated to well-known field names
 */
export const NAMED_MATCHERS: Record<string, HeuristicMatcher> = {
  name: matchName,
  cuisine: matchCuisine,
  menu: matchMenuItems,
  social_media: matchSocialLinks,
};

/**
 * Matchers by value format
 */
export const FORMAT_MATCHERS: Partial<Record<FieldFormat, HeuristicMatcher>> = {
  phone: matchPhone,
  email: matchEmail,
  address: matchAddress,
  hours: matchHours,
  price_range: matchPriceRange,
};
