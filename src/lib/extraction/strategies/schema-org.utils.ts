/**
 * schema.org Utilities
 * Type matching and value flattening shared by the JSON-LD and microdata strategies
 */

import { FieldDefinition } from '../extraction.types';

/**
 * Properties whose value is a list of further items rather than an item itself
 */
export const CONTAINER_PROPS = ['hasMenu', 'hasMenuSection', 'hasMenuItem', 'itemListElement'];

export interface PostalAddressParts {
  streetAddress?: string;
  addressLocality?: string;
  addressRegion?: string;
  postalCode?: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * "https://schema.org/Restaurant" → "Restaurant"
 */
export function schemaTypeName(type: string): string {
  const trimmed = type.trim().replace(/\/+$/, '');
  const slash = trimmed.lastIndexOf('/');
  const hash = trimmed.lastIndexOf('#');
  const cut = Math.max(slash, hash);
  return cut >= 0 ? trimmed.slice(cut + 1) : trimmed;
}

/**
 * Type names of an @type / itemtype value (string, space-separated list or array)
 */
export function typeNames(value: unknown): string[] {
  if (typeof value === 'string') {
    return value.split(/\s+/).filter(Boolean).map(schemaTypeName);
  }
  if (Array.isArray(value)) {
    return value.flatMap(typeNames);
  }
  return [];
}

export function matchesEntityType(value: unknown, entityTypes: string[]): boolean {
  const wanted = entityTypes.map((type) => type.toLowerCase());
  return typeNames(value).some((name) => wanted.includes(name.toLowerCase()));
}

/**
 * "street, City, ST 12345"
 */
export function formatPostalAddress(parts: PostalAddressParts): string {
  const regionLine = [parts.addressRegion, parts.postalCode].filter(Boolean).join(' ');
  return [parts.streetAddress, parts.addressLocality, regionLine]
    .map((part) => (part ?? '').trim())
    .filter(Boolean)
    .join(', ');
}

export function looksLikeAbsoluteUrl(value: string): boolean {
  return /^https?:\/\//i.test(value.trim());
}

function stringProp(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return undefined;
}

/**
 * "Monday, Tuesday 11:00-22:00" from an OpeningHoursSpecification
 */
function formatOpeningHoursSpec(record: Record<string, unknown>): string {
  const days = typeNames(record.dayOfWeek).join(', ');
  const opens = stringProp(record, 'opens');
  const closes = stringProp(record, 'closes');
  const time = opens && closes ? `${opens}-${closes}` : opens ?? closes ?? '';
  return [days, time].filter(Boolean).join(' ');
}

/**
 * Flatten a JSON-LD property value into strings for a field.
 * Scalar fields receive the parts joined into one candidate.
 */
export function jsonLdValueToStrings(value: unknown, field: FieldDefinition): string[] {
  const parts = flattenJsonLd(value, field, 0);
  if (field.multiple || parts.length <= 1) {
    return parts;
  }

  const separator = field.format === 'hours' ? '; ' : ', ';
  return [parts.join(separator)];
}

function flattenJsonLd(value: unknown, field: FieldDefinition, depth: number): string[] {
  if (value === null || value === undefined || depth > 6) {
    return [];
  }

  if (typeof value === 'string') {
    if (field.format !== 'url' && looksLikeAbsoluteUrl(value)) {
      return [];
    }
    return value.trim() ? [value.trim()] : [];
  }

  if (typeof value === 'number' || typeof value === 'boolean') {
    return [String(value)];
  }

  if (Array.isArray(value)) {
    return value.flatMap((item) => flattenJsonLd(item, field, depth + 1));
  }

  if (!isRecord(value)) {
    return [];
  }

  const types = typeNames(value['@type']);

  if (types.includes('PostalAddress') || 'streetAddress' in value) {
    const formatted = formatPostalAddress({
      streetAddress: stringProp(value, 'streetAddress'),
      addressLocality: stringProp(value, 'addressLocality'),
      addressRegion: stringProp(value, 'addressRegion'),
      postalCode: stringProp(value, 'postalCode'),
    });
    return formatted ? [formatted] : [];
  }

  if (types.includes('OpeningHoursSpecification') || 'opens' in value) {
    const formatted = formatOpeningHoursSpec(value);
    return formatted ? [formatted] : [];
  }

  // Menus and sections: descend into their items
  const nested = CONTAINER_PROPS.filter((key) => key in value);
  if (nested.length > 0) {
    return nested.flatMap((key) => flattenJsonLd(value[key], field, depth + 1));
  }

  if (field.format === 'url') {
    const url = stringProp(value, 'url') ?? stringProp(value, '@id');
    return url ? [url] : [];
  }

  const name = stringProp(value, 'name');
  return name && name.trim() ? [name.trim()] : [];
}
