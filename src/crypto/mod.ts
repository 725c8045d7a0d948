/**
 * Crypto primitives for the auth wire layer
 */

export * from './ciphers.ts';
export * from './random.ts';
export * from './scramble.ts';
