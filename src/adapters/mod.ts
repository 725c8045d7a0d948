/**
 * Transport adapters
 */

export * from './types.ts';
export * from './node.ts';
