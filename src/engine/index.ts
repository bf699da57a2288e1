/**
 * Engine exports.
 */

export * from './capability';
export * from './conditions';
export * from './executor';
export * from './expression';
export * from './node-runner';
export * from './template';
