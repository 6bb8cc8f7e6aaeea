/**
 * Caesar shift over the 26-letter Latin alphabet
 * Letters rotate within their own case, every other byte is left alone
 */

export const ALPHABET_SIZE = 26;

const UPPER_A = 0x41;
const UPPER_Z = 0x5a;
const LOWER_A = 0x61;
const LOWER_Z = 0x7a;

/**
 * Reduce any integer shift into [0, 26), including negative shifts.
 */
export function normalizeShift(shift: number): number {
  return ((shift % ALPHABET_SIZE) + ALPHABET_SIZE) % ALPHABET_SIZE;
}

function alphabetBase(byte: number): number | undefined {
  if (byte >= UPPER_A && byte <= UPPER_Z) return UPPER_A;
  if (byte >= LOWER_A && byte <= LOWER_Z) return LOWER_A;
  return undefined;
}

/**
 * Shift a single byte. Positive shifts rotate right (encrypt),
 * negative shifts rotate left (decrypt).
 */
export function shiftByte(shift: number, byte: number): number {
  const base = alphabetBase(byte);
  if (base === undefined) return byte;

  const offset = (byte - base + normalizeShift(shift)) % ALPHABET_SIZE;
  return base + offset;
}

export function shiftBytes(shift: number, input: Uint8Array): Buffer {
  const out = Buffer.allocUnsafe(input.length);
  const normalized = normalizeShift(shift);
  for (let i = 0; i < input.length; i += 1) {
    out[i] = shiftByte(normalized, input[i]);
  }
  return out;
}

/**
 * Shift every ASCII letter of a string. Other UTF-16 code units,
 * including non-ASCII characters, are copied through as-is.
 */
export function shiftText(shift: number, text: string): string {
  const normalized = normalizeShift(shift);
  let result = '';
  for (let i = 0; i < text.length; i += 1) {
    result += String.fromCharCode(shiftByte(normalized, text.charCodeAt(i)));
  }
  return result;
}
