/**
 * Auth Protocol Utilities
 */

import { makeError } from '../errors.ts';
import { BUFFER_SIZE } from './constants.ts';

/**
 * Round `size` up to a multiple of `blockSize`.
 *
 * The padded size must stay strictly below `limit`, the scratch buffers
 * need room for the trailing words written after the body.
 */
export function pad(size: number, blockSize: number, limit: number = BUFFER_SIZE): number {
  const rem = size % blockSize;
  const padded = rem !== 0 ? size + (blockSize - rem) : size;
  if (padded >= limit) {
    throw makeError(`Buffer size (${padded}) exceeded limit (${limit})`, 'encoding-overflow');
  }
  return padded;
}
