/**
 * Tests for secure random helpers
 */

import { expect, test } from 'vitest';
import { randomBytes, randomFill, secureRandom } from '../src/crypto/random.ts';

test('randomBytes returns the requested length', () => {
  expect(randomBytes(16).length).toBe(16);
  expect(randomBytes(0).length).toBe(0);
});

test('randomFill only touches the requested range', () => {
  const buf = new Uint8Array(8);
  randomFill(buf, 2, 4);
  expect(Array.from(buf.subarray(0, 2))).toEqual([0, 0]);
  expect(Array.from(buf.subarray(6))).toEqual([0, 0]);
});

test('secureRandom fills and returns the same buffer', () => {
  const buf = new Uint8Array(64);
  expect(secureRandom.fill(buf)).toBe(buf);
  expect(buf.some((byte) => byte !== 0)).toBe(true);
});
