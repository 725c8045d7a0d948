/**
 * Tests for the legacy scramble functions
 */

import { expect, test } from 'vitest';
import { cipherShim, scrambleInit, scrambleModulus } from '../src/crypto/scramble.ts';
import { fromHex, toHex } from '../src/utils/binary.ts';
import { TEST_MODULUS_SCRAMBLED_HEX, testModulus, unscrambleInit } from './helpers.ts';

test('scrambleModulus produces the expected bytes', () => {
  const modulus = testModulus();
  const result = scrambleModulus(modulus);
  expect(result).toBe(modulus);
  expect(toHex(modulus)).toBe(TEST_MODULUS_SCRAMBLED_HEX);
});

test('scrambleModulus swaps bytes 0..3 with 77..80 first', () => {
  const modulus = new Uint8Array(128);
  modulus.set([1, 2, 3, 4], 77);
  scrambleModulus(modulus);
  // 0..3 <- 77..80, then 64..67 ^= 0..3; 77..80 became zero
  expect(Array.from(modulus.subarray(0, 4))).toEqual([1, 2, 3, 4]);
  expect(Array.from(modulus.subarray(64, 68))).toEqual([1, 2, 3, 4]);
  expect(Array.from(modulus.subarray(77, 81))).toEqual([0, 0, 0, 0]);
});

test('scrambleModulus rejects anything but 128 bytes', () => {
  expect(() => scrambleModulus(new Uint8Array(127))).toThrow(RangeError);
  expect(() => scrambleModulus(new Uint8Array(256))).toThrow('Modulus must be 128 bytes, got 256');
});

test('scrambleInit chains the key through each word', () => {
  const buf = fromHex('aabbccdd' + '01000000' + '02000000' + 'ffffffff' + '00000000' + '00000000');
  const key = scrambleInit(buf, 16, 0x10203040);
  expect(key).toBe(0x10203042);
  expect(toHex(buf)).toBe('aabbccdd' + '40302010' + '41302010' + 'bdcfdfef' + '42302010' + '00000000');
});

test('scrambleInit leaves the first word untouched', () => {
  const buf = fromHex('0102030400000000');
  scrambleInit(buf, 4, 7);
  expect(toHex(buf)).toBe('0102030407000000');
});

test('scrambleInit wraps as a signed 32-bit sum', () => {
  const buf = fromHex('00000000' + 'ffffff7f' + '01000000' + '00000000');
  const key = scrambleInit(buf, 12, 1);
  expect(key).toBe(-2147483647);
  expect(toHex(buf)).toBe('00000000' + 'ffffffff' + '00000080' + '01000080');
});

test('scrambleInit needs room for the trailing key', () => {
  expect(() => scrambleInit(new Uint8Array(16), 16, 0)).toThrow(RangeError);
});

test('scrambleInit output can be reversed from the trailer', () => {
  const original = new Uint8Array(40);
  for (let i = 0; i < 36; i++) {
    original[i] = (i * 29 + 3) & 0xff;
  }
  const buf = original.slice();
  scrambleInit(buf, 36, -123456789);
  expect(toHex(unscrambleInit(buf, 36).subarray(0, 36))).toBe(toHex(original.subarray(0, 36)));
});

test('cipherShim reverses each 4-byte group', () => {
  const buf = fromHex('0102030405060708');
  expect(toHex(cipherShim(buf))).toBe('0403020108070605');
});

test('cipherShim leaves a trailing partial group alone', () => {
  const buf = fromHex('01020304050607');
  expect(toHex(cipherShim(buf))).toBe('04030201050607');
});

test('cipherShim is its own inverse', () => {
  const buf = fromHex('00112233445566778899aabbccddeeff');
  cipherShim(buf);
  cipherShim(buf);
  expect(toHex(buf)).toBe('00112233445566778899aabbccddeeff');
});
