/**
 * @qwalk/core
 * Validation, pair-label codec and the ResultsTable post-processor
 */

export * from './errors/index.js';
export * from './schema/index.js';
export * from './labels/index.js';
export * from './results/index.js';
