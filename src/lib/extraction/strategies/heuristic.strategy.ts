/**
 * Heuristic Strategy
 * Text patterns, labels and common class names for pages without markup
 */

import { BaseExtractionStrategy } from '../extraction.strategy';
import {
  ExtractionContext,
  ExtractionStrategyType,
  FieldDefinition,
  FieldSchema,
  RawCandidates,
} from '../extraction.types';
import { FORMAT_MATCHERS, HeuristicContext, HeuristicMatcher, NAMED_MATCHERS, matchGeneric } from './heuristic.matchers';

export class HeuristicStrategy extends BaseExtractionStrategy {
  name = 'Heuristic Patterns';
  type = ExtractionStrategyType.HEURISTIC;
  baseConfidence = 0.4;

  protected collect(context: ExtractionContext, fields: FieldDefinition[], _schema: FieldSchema): RawCandidates {
    const candidates: RawCandidates = new Map();
    const heuristicContext: HeuristicContext = {
      ...context,
      lines: context.text.split('\n').filter(Boolean),
    };

    for (const field of fields) {
      this.push(candidates, field.name, this.matcherFor(field)(heuristicContext, field));
    }

    return candidates;
  }

  /**
   * Field-name matcher first, then one by format, then the generic label/class lookup
   */
  private matcherFor(field: FieldDefinition): HeuristicMatcher {
    const named = NAMED_MATCHERS[field.name];
    if (named) {
      return named;
    }

    const byFormat = field.format ? FORMAT_MATCHERS[field.format] : undefined;
    return byFormat ?? matchGeneric;
  }
}
