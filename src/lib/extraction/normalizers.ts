/**
 * Field Normalizers
 * Canonical forms and completeness checks applied before values leave the engine
 */

import { collapseWhitespace } from '../processing';
import { FieldFormat } from './extraction.types';

const EMAIL_PATTERN = /^[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}$/i;
const STREET_SUFFIX =
  /\b(street|st|avenue|ave|road|rd|boulevard|blvd|drive|dr|lane|ln|way|court|ct|place|pl|parkway|pkwy|highway|hwy|square|sq)\b\.?/i;
const ZIP_PATTERN = /\b\d{5}(-\d{4})?\b/;
const PRICE_TOKEN = /^\${1,4}$/;
const PRICE_RANGE = /\$?\s*(\d+(?:\.\d{2})?)\s*(?:-|–|to)\s*\$?\s*(\d+(?:\.\d{2})?)/i;

export function digitsOf(value: string): string {
  return value.replace(/\D/g, '');
}

/**
 * (AAA) BBB-CCCC for 10/11-digit NANP numbers, BBB-CCCC for 7 digits.
 * Anything with fewer than 7 digits is not a phone number.
 */
export function normalizePhone(raw: string): string | null {
  let digits = digitsOf(raw);

  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }

  if (digits.length === 10) {
    return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  }
  if (digits.length === 7) {
    return `${digits.slice(0, 3)}-${digits.slice(3)}`;
  }
  if (digits.length < 7) {
    return null;
  }

  return collapseWhitespace(raw);
}

export function normalizeAddress(raw: string): string | null {
  const value = collapseWhitespace(raw)
    .replace(/\s*,\s*/g, ', ')
    .replace(/(,\s*)+$/, '')
    .replace(/^(,\s*)+/, '');
  return value || null;
}

/**
 * "$$" tokens stay as they are; numeric ranges become "$15-$25"
 */
export function normalizePriceRange(raw: string): string | null {
  const value = collapseWhitespace(raw);
  if (!value) {
    return null;
  }
  if (PRICE_TOKEN.test(value)) {
    return value;
  }

  const range = value.match(PRICE_RANGE);
  if (range) {
    return `$${range[1]}-$${range[2]}`;
  }

  return value;
}

export function normalizeEmail(raw: string): string | null {
  const value = raw.trim().replace(/^mailto:/i, '').split('?')[0].toLowerCase();
  return EMAIL_PATTERN.test(value) ? value : null;
}

export function normalizeHours(raw: string): string | null {
  const value = collapseWhitespace(raw)
    .replace(/^(business\s+hours|opening\s+hours|hours)\s*:?\s*/i, '')
    .replace(/\s*([-–])\s*/g, '-');
  return value || null;
}

export function normalizeUrlValue(raw: string, baseUrl?: string): string | null {
  try {
    const url = baseUrl ? new URL(raw.trim(), baseUrl) : new URL(raw.trim());
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }
    return url.href;
  } catch {
    return null;
  }
}

export function normalizeText(raw: string): string | null {
  const value = collapseWhitespace(raw);
  return value || null;
}

/**
 * Normalize a raw value by field format
 */
export function normalizeValue(format: FieldFormat, raw: string, baseUrl?: string): string | null {
  switch (format) {
    case 'phone':
      return normalizePhone(raw);
    case 'address':
      return normalizeAddress(raw);
    case 'price_range':
      return normalizePriceRange(raw);
    case 'email':
      return normalizeEmail(raw);
    case 'hours':
      return normalizeHours(raw);
    case 'url':
      return normalizeUrlValue(raw, baseUrl);
    default:
      return normalizeText(raw);
  }
}

/**
 * Fully-formed values earn the completeness bonus
 */
export function isComplete(format: FieldFormat, value: string): boolean {
  switch (format) {
    case 'phone':
      return digitsOf(value).length >= 10;
    case 'address':
      return /^\d+\s+\S+/.test(value) && (STREET_SUFFIX.test(value) || ZIP_PATTERN.test(value));
    case 'price_range':
      return PRICE_TOKEN.test(value) || /^\$\d+(\.\d{2})?-\$\d+(\.\d{2})?$/.test(value);
    case 'email':
      return EMAIL_PATTERN.test(value);
    default:
      return false;
  }
}
