/**
 * Structured Data Strategy
 * Reads JSON-LD blocks whose @type matches the schema's entity types
 */

import { BaseExtractionStrategy } from '../extraction.strategy';
import {
  ExtractionContext,
  ExtractionStrategyType,
  FieldDefinition,
  FieldSchema,
  RawCandidates,
} from '../extraction.types';
import { isRecord, jsonLdValueToStrings, matchesEntityType } from './schema-org.utils';

const MAX_WALK_DEPTH = 5;

export class StructuredDataStrategy extends BaseExtractionStrategy {
  name = 'JSON-LD Structured Data';
  type = ExtractionStrategyType.STRUCTURED_DATA;
  baseConfidence = 0.9;

  protected collect(context: ExtractionContext, fields: FieldDefinition[], schema: FieldSchema): RawCandidates {
    const candidates: RawCandidates = new Map();
    const entities = this.findEntities(context, schema.entityTypes);

    for (const entity of entities) {
      for (const field of fields) {
        for (const key of this.keysFor(field)) {
          if (key in entity) {
            this.push(candidates, field.name, jsonLdValueToStrings(entity[key], field));
          }
        }
      }
    }

    return candidates;
  }

  /**
   * Parse every JSON-LD block and collect objects of a wanted type.
   * A block that fails to parse is skipped.
   */
  findEntities(context: ExtractionContext, entityTypes: string[]): Array<Record<string, unknown>> {
    const { $ } = context;
    const entities: Array<Record<string, unknown>> = [];

    $('script[type="application/ld+json"]').each((index, el) => {
      const raw = $(el).text().trim();
      if (!raw) {
        return;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error: unknown) {
        console.warn(
          `Extraction ${context.url}: skipping malformed JSON-LD block ${index}: ${error instanceof Error ? error.message : String(error)}`
        );
        return;
      }

      this.walk(parsed, entityTypes, entities, 0);
    });

    return entities;
  }

  private walk(node: unknown, entityTypes: string[], out: Array<Record<string, unknown>>, depth: number): void {
    if (depth > MAX_WALK_DEPTH) {
      return;
    }

    if (Array.isArray(node)) {
      node.forEach((item) => this.walk(item, entityTypes, out, depth + 1));
      return;
    }

    if (!isRecord(node)) {
      return;
    }

    if (matchesEntityType(node['@type'], entityTypes)) {
      out.push(node);
      return;
    }

    // @graph, mainEntity, about and other wrappers
    for (const value of Object.values(node)) {
      if (typeof value === 'object' && value !== null) {
        this.walk(value, entityTypes, out, depth + 1);
      }
    }
  }
}
