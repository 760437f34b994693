/**
 * Extraction Strategies
 */

export * from './schema-org.utils';
export * from './structured-data.strategy';
export * from './semantic-markup.strategy';
export * from './heuristic.matchers';
export * from './heuristic.strategy';
