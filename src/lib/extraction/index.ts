/**
 * Extraction System
 * Main export file for the extraction engine and its strategies
 */

export * from './extraction.types';
export * from './extraction.strategy';
export * from './extraction.engine';
export * from './normalizers';
export * from './schemas/restaurant.schema';
export * from './strategies';
