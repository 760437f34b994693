/**
 * Extraction Types
 * Type definitions for the extraction strategy system
 */

import * as cheerio from 'cheerio';
import { PageType } from '../crawling/crawling.types';

/**
 * Extraction strategy type enumeration, in priority order
 */
export enum ExtractionStrategyType {
  STRUCTURED_DATA = 'structured_data',
  SEMANTIC_MARKUP = 'semantic_markup',
  HEURISTIC = 'heuristic',
}

/**
 * Value shape used for normalization and completeness scoring
 */
export type FieldFormat = 'text' | 'phone' | 'address' | 'email' | 'price_range' | 'hours' | 'url';

/**
 * One field of a target-domain schema
 */
export interface FieldDefinition {
  name: string;
  required: boolean;
  importanceWeight: number;

  /**
   * List-valued field (unioned across pages) instead of a single value
   */
  multiple?: boolean;

  format?: FieldFormat;

  /**
   * JSON-LD / microdata property names holding this field (default: the field name)
   */
  structuredDataKeys?: string[];

  /**
   * Text labels ("Phone:", "Cuisine:") the heuristic strategy looks for
   */
  labels?: string[];

  /**
   * Page types whose values win confidence ties, most authoritative first
   */
  authoritativePageTypes?: PageType[];
}

/**
 * Explicit, ordered field set for one target domain
 */
export interface FieldSchema {
  domain: string;

  /**
   * schema.org types accepted by the structured-data and microdata strategies
   */
  entityTypes: string[];

  fields: FieldDefinition[];
}

/**
 * A single extracted datum
 */
export interface FieldValue {
  value: string | string[];
  confidence: number; // 0-1
  sourceUrl: string;
  strategy: ExtractionStrategyType;
}

/**
 * Field name → values found on one page. Absent fields have no key.
 */
export type FieldMap = Record<string, FieldValue[]>;

/**
 * Raw candidates from a strategy before normalization.
 * Scalar fields: alternatives in preference order. List fields: items.
 */
export type RawCandidates = Map<string, string[]>;

/**
 * Extraction context - input data for extraction
 */
export interface ExtractionContext {
  html: string;
  url: string;
  $: cheerio.CheerioAPI;
  text: string;
}

/**
 * Page input to the engine
 */
export interface PageContent {
  html: string;
  url: string;
}
