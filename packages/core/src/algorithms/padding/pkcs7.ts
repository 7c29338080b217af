// packages/core/src/algorithms/padding/pkcs7.ts
import { InvalidPaddingError } from '../../errors/index.js';

const MAX_PAD = 16;

/**
 * Strip PKCS#7 padding (AES block size). An empty buffer is returned as-is.
 * Returns a view into `padded`.
 */
export function pkcs7Unpad(padded: Uint8Array): Uint8Array {
  if (padded.length === 0) return padded;

  const p = padded[padded.length - 1];
  if (p === 0 || p > MAX_PAD || p > padded.length) {
    throw new InvalidPaddingError(`Invalid PKCS#7 padding length ${p}`);
  }
  for (let i = padded.length - p; i < padded.length; i++) {
    if (padded[i] !== p) {
      throw new InvalidPaddingError('Invalid PKCS#7 padding bytes');
    }
  }
  return padded.subarray(0, padded.length - p);
}
