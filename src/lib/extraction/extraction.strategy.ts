/**
 * Extraction Strategy
 * Base interface and abstract class for extraction strategies
 */

import {
  ExtractionStrategyType,
  ExtractionContext,
  FieldDefinition,
  FieldMap,
  FieldSchema,
  FieldValue,
  RawCandidates,
} from './extraction.types';
import { foldForComparison } from '../processing';
import { isComplete, normalizeValue } from './normalizers';

/**
 * Completeness bonus added to the base confidence
 */
export const COMPLETENESS_BONUS = 0.05;

/**
 * Extraction strategy interface
 */
export interface IExtractionStrategy {
  /**
   * Strategy name
   */
  name: string;

  /**
   * Strategy type
   */
  type: ExtractionStrategyType;

  /**
   * Base confidence for values this strategy produces
   */
  baseConfidence: number;

  /**
   * Extract values for the given (still unresolved) fields
   */
  extract(context: ExtractionContext, fields: FieldDefinition[], schema: FieldSchema): Promise<FieldMap>;

  /**
   * Check if strategy is available/configured
   */
  isAvailable(): boolean;
}

/**
 * Base extraction strategy class
 * Subclasses collect raw candidates; normalization and scoring happen here
 */
export abstract class BaseExtractionStrategy implements IExtractionStrategy {
  abstract name: string;
  abstract type: ExtractionStrategyType;
  abstract baseConfidence: number;

  /**
   * Collect raw candidates per field name
   */
  protected abstract collect(
    context: ExtractionContext,
    fields: FieldDefinition[],
    schema: FieldSchema
  ): RawCandidates;

  isAvailable(): boolean {
    return true;
  }

  async extract(context: ExtractionContext, fields: FieldDefinition[], schema: FieldSchema): Promise<FieldMap> {
    const candidates = this.collect(context, fields, schema);
    const result: FieldMap = {};

    for (const field of fields) {
      const raw = candidates.get(field.name);
      if (!raw || raw.length === 0) {
        continue;
      }

      const values = this.buildFieldValues(field, raw, context.url);
      if (values.length > 0) {
        result[field.name] = values;
      }
    }

    return result;
  }

  /**
   * Normalize raw candidates into FieldValues.
   * Scalar fields keep the first valid candidate; list fields keep every distinct item.
   */
  protected buildFieldValues(field: FieldDefinition, raw: string[], sourceUrl: string): FieldValue[] {
    const format = field.format ?? 'text';
    const normalized: string[] = [];
    const seen = new Set<string>();

    for (const candidate of raw) {
      const value = normalizeValue(format, candidate, sourceUrl);
      if (!value) {
        continue;
      }
      const key = foldForComparison(value);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      normalized.push(value);
    }

    if (normalized.length === 0) {
      return [];
    }

    if (field.multiple) {
      return [
        {
          value: normalized,
          confidence: this.score(this.baseConfidence, false),
          sourceUrl,
          strategy: this.type,
        },
      ];
    }

    const value = normalized[0];
    return [
      {
        value,
        confidence: this.score(this.baseConfidence, isComplete(format, value)),
        sourceUrl,
        strategy: this.type,
      },
    ];
  }

  protected score(base: number, complete: boolean): number {
    const confidence = Math.min(1, base + (complete ? COMPLETENESS_BONUS : 0));
    return Math.round(confidence * 100) / 100;
  }

  /**
   * Property names for a field (defaults to the field name)
   */
  protected keysFor(field: FieldDefinition): string[] {
    return field.structuredDataKeys && field.structuredDataKeys.length > 0 ? field.structuredDataKeys : [field.name];
  }

  /**
   * Add candidates to a field's list
   */
  protected push(candidates: RawCandidates, fieldName: string, values: string[]): void {
    if (values.length === 0) {
      return;
    }
    const existing = candidates.get(fieldName) ?? [];
    candidates.set(fieldName, [...existing, ...values]);
  }
}
