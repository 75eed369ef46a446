import { randomBytes } from 'node:crypto';

export const ALPHANUMERIC =
  '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';

/**
 * Uniformly random string drawn from `alphabet` using the system CSPRNG.
 * Bytes at or above the largest multiple of the alphabet size are discarded,
 * so every character is equally likely.
 */
export function randomString(length: number, alphabet = ALPHANUMERIC): string {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError('length must be a positive integer');
  }
  if (alphabet.length < 2 || alphabet.length > 256) {
    throw new RangeError('alphabet must hold between 2 and 256 characters');
  }

  const limit = 256 - (256 % alphabet.length);
  let out = '';

  while (out.length < length) {
    for (const byte of randomBytes(length * 2)) {
      if (byte >= limit) continue;
      out += alphabet[byte % alphabet.length];
      if (out.length === length) break;
    }
  }

  return out;
}
