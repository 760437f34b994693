/**
 * Site Orchestration
 * Main export file for the per-site crawl
 */

export * from './orchestrator.types';
export * from './site-orchestrator';
