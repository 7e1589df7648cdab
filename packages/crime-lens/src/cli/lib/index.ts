/**
 * CLI library exports
 *
 * @module cli/lib
 */

export * from './config.js';
export * from './context.js';
export * from './exit-codes.js';
export * from './output.js';
