/**
 * Extraction Engine
 * Runs the strategies in priority order over one page
 */

import { htmlProcessor, HtmlProcessor } from '../processing';
import { ExtractionError } from '../scraping/errors';
import { IExtractionStrategy } from './extraction.strategy';
import {
  ExtractionContext,
  ExtractionStrategyType,
  FieldMap,
  FieldSchema,
  PageContent,
} from './extraction.types';
import { RESTAURANT_SCHEMA } from './schemas/restaurant.schema';
import { HeuristicStrategy } from './strategies/heuristic.strategy';
import { SemanticMarkupStrategy } from './strategies/semantic-markup.strategy';
import { StructuredDataStrategy } from './strategies/structured-data.strategy';

export function createDefaultStrategies(): IExtractionStrategy[] {
  return [new StructuredDataStrategy(), new SemanticMarkupStrategy(), new HeuristicStrategy()];
}

export class ExtractionEngine {
  private strategies: IExtractionStrategy[];
  private processor: HtmlProcessor;

  constructor(strategies: IExtractionStrategy[] = createDefaultStrategies(), processor: HtmlProcessor = htmlProcessor) {
    this.strategies = [...strategies];
    this.processor = processor;
  }

  /**
   * Register a strategy. A strategy of an already-registered type replaces it in place.
   */
  registerStrategy(strategy: IExtractionStrategy): void {
    const index = this.strategies.findIndex((existing) => existing.type === strategy.type);
    if (index >= 0) {
      this.strategies[index] = strategy;
    } else {
      this.strategies.push(strategy);
    }
  }

  unregisterStrategy(type: ExtractionStrategyType): boolean {
    const before = this.strategies.length;
    this.strategies = this.strategies.filter((strategy) => strategy.type !== type);
    return this.strategies.length < before;
  }

  getStrategies(): ExtractionStrategyType[] {
    return this.strategies.map((strategy) => strategy.type);
  }

  /**
   * Extract schema fields from one page.
   * Each field is resolved by the first strategy that produces it; later strategies
   * only see fields still unresolved. Never throws: malformed content yields {}.
   */
  async extract(page: PageContent, schema: FieldSchema = RESTAURANT_SCHEMA): Promise<FieldMap> {
    if (typeof page.html !== 'string' || page.html.trim().length === 0) {
      return {};
    }

    let context: ExtractionContext;
    try {
      const processed = this.processor.process(page.html);
      context = { html: page.html, url: page.url, $: processed.$, text: processed.text };
    } catch (error: unknown) {
      this.logFailure(new ExtractionError(`cannot parse content of ${page.url}`, { cause: error }));
      return {};
    }

    const result: FieldMap = {};

    for (const strategy of this.strategies) {
      if (!strategy.isAvailable()) {
        continue;
      }

      const remaining = schema.fields.filter((field) => !(field.name in result));
      if (remaining.length === 0) {
        break;
      }

      try {
        const found = await strategy.extract(context, remaining, schema);
        for (const field of remaining) {
          const values = found[field.name];
          if (values && values.length > 0) {
            result[field.name] = values;
          }
        }
      } catch (error: unknown) {
        this.logFailure(new ExtractionError(`${strategy.name} failed on ${page.url}`, { cause: error }));
      }
    }

    return result;
  }

  private logFailure(error: ExtractionError): void {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    console.error(`Extraction: ${error.message}${cause}`);
  }
}

export const extractionEngine = new ExtractionEngine();
