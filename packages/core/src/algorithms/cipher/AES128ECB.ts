import { ecb } from '@noble/ciphers/aes.js';
import { CipherFailureError } from '../../errors/index.js';

/** Block-mode decryption service: independent blocks, no chaining, no padding. */
export interface BlockCipher {
  readonly BLOCK_SIZE: number;
  decryptBlocks(ciphertext: Uint8Array, key: Uint8Array): Uint8Array;
}

/**
 * AES-128 in ECB mode backed by `@noble/ciphers`.
 *
 * Library padding is disabled: the caller strips PKCS#7 itself so that bad
 * padding surfaces as its own error kind. Input that is not block-aligned,
 * or a key that is not 16 bytes, fails with {@link CipherFailureError}.
 */
export class AES128ECB implements BlockCipher {
  public static readonly BLOCK_SIZE: number = 16;
  public static readonly KEY_LENGTH: number = 16;

  public readonly BLOCK_SIZE = AES128ECB.BLOCK_SIZE;

  public decryptBlocks(ciphertext: Uint8Array, key: Uint8Array): Uint8Array {
    if (key.length !== AES128ECB.KEY_LENGTH) {
      throw new CipherFailureError(`AES-128 key must be 16 bytes, got ${key.length}`);
    }
    if (ciphertext.length % AES128ECB.BLOCK_SIZE !== 0) {
      throw new CipherFailureError(
        `Ciphertext length ${ciphertext.length} is not a multiple of ${AES128ECB.BLOCK_SIZE}`,
      );
    }
    try {
      return ecb(key, { disablePadding: true }).decrypt(ciphertext);
    } catch (err) {
      throw new CipherFailureError(
        `AES-128-ECB decryption failed: ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  }
}
