/**
 * Auth Protocol Module
 *
 * Constants, message model and packet pipelines.
 */

export * from './constants.ts';
export * from './utils.ts';
export * from './messages.ts';
export * from './sender.ts';
export * from './reader.ts';
