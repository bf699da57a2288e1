/**
 * Storage exports.
 */

export * from './file-store';
export * from './memory-store';
export * from './path-accessor';
export * from './store';
