/**
 * Tests for protocol utilities
 */

import { expect, test } from 'vitest';
import { isAuthError } from '../src/errors.ts';
import { BUFFER_SIZE } from '../src/protocol/constants.ts';
import { pad } from '../src/protocol/utils.ts';

test('pad rounds up to the block size', () => {
  expect(pad(0, 4)).toBe(0);
  expect(pad(1, 4)).toBe(4);
  expect(pad(4, 4)).toBe(4);
  expect(pad(21, 4)).toBe(24);
  expect(pad(172, 8)).toBe(176);
  expect(pad(184, 8)).toBe(184);
});

test('pad rejects sizes reaching the buffer limit', () => {
  expect(pad(BUFFER_SIZE - 4, 4)).toBe(BUFFER_SIZE - 4);
  expect(() => pad(BUFFER_SIZE - 3, 4)).toThrow(`Buffer size (${BUFFER_SIZE}) exceeded limit (${BUFFER_SIZE})`);
});

test('pad overflow is an encoding-overflow error', () => {
  let error: unknown;
  try {
    pad(21, 4, 24);
  } catch (err) {
    error = err;
  }
  expect(isAuthError(error, 'encoding-overflow')).toBe(true);
  expect(error instanceof Error && error.message).toBe('Buffer size (24) exceeded limit (24)');
});
