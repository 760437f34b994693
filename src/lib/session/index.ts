/**
 * Batch Sessions
 * Main export file for batch runs and progress reporting
 */

export * from './session.types';
export * from './progress-channel';
export * from './resource-monitor';
export * from './batch-session.manager';
