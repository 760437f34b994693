/**
 * Content Processing
 * Main export file for HTML and text helpers
 */

export * from './html.processor';
export * from './text.processor';
