/**
 * Workflow definition exports.
 */

export * from './loader';
export * from './schema';
export * from './validator';
