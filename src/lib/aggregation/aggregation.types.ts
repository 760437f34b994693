/**
 * Aggregation Types
 * Type definitions for merging page results into one entity record
 */

import type { PageType } from '../crawling/crawling.types';
import type { ExtractionStrategyType } from '../extraction/extraction.types';

/**
 * Final value of one field
 */
export interface ResolvedField {
  value: string | string[];
  confidence: number;

  /**
   * Page URLs that produced the value
   */
  sources: string[];

  strategy: ExtractionStrategyType;
  pageTypes: PageType[];
}

/**
 * Candidate values that tied on every ranking criterion
 */
export interface AggregationConflict {
  field: string;
  values: string[];
  chosen: string;
  confidence: number;
}

/**
 * Page contribution summary
 */
export interface ContributingPage {
  url: string;
  pageType: PageType;
  sequence: number;
  fields: string[];
}

/**
 * Consolidated record for one site. Frozen on creation.
 */
export interface EntityRecord {
  readonly siteUrl: string;
  readonly fields: Readonly<Record<string, ResolvedField>>;

  /**
   * Schema fields no page produced, in schema order
   */
  readonly absentFields: readonly string[];

  /**
   * Importance-weighted mean over resolved fields
   */
  readonly confidence: number;

  readonly unresolvedConflicts: readonly AggregationConflict[];
  readonly contributingPages: readonly ContributingPage[];

  /**
   * Field name → number of candidates seen across pages
   */
  readonly candidateCounts: Readonly<Record<string, number>>;

  readonly createdAt: string;
}
