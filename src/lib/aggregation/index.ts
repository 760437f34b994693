/**
 * Aggregation
 * Main export file for page-result merging
 */

export * from './aggregation.types';
export * from './data-aggregator';
export * from './freeze';
