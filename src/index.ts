/**
 * loopflow: stateless, resumable workflow engine over a JSON store document.
 *
 * Public exports for programmatic use. The command line lives in ./cli.
 */

export * from './capabilities/validator';
export * from './config';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './logger';
export * from './runner';
export * from './storage';
