/**
 * Domain model exports.
 */

export * from './errors';
export * from './json';
export * from './run';
export * from './workflow';
