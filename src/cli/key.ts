/**
 * Key parsing and shift resolution
 */

import type { CipherMode } from '../types/index.js';
import { KeyError } from './errors.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a cipher key: a base-10 integer that fits in the safe integer
 * range and is not negative. Leading and trailing whitespace is ignored.
 */
export function parseKey(raw: string): number {
  const text = raw.trim();
  if (!INTEGER_PATTERN.test(text)) {
    throw new KeyError('format', raw);
  }

  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new KeyError('range', raw);
  }
  if (value < 0) {
    throw new KeyError('negative', raw);
  }
  // Number('-0') is -0
  return value === 0 ? 0 : value;
}

/**
 * Decrypting is shifting by the negated key.
 */
export function resolveShift(mode: CipherMode, key: number): number {
  return mode === 'encrypt' ? key : -key;
}
