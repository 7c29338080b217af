// packages/core/src/container/key.ts
import type { ByteCursor } from '../util/ByteCursor.js';
import type { BlockCipher } from '../algorithms/cipher/AES128ECB.js';
import { pkcs7Unpad } from '../algorithms/padding/pkcs7.js';
import { coreKey, KEY_XOR_MASK } from '../config/keys.js';
import { xorMask } from '../util/bytes.js';

/**
 * Key block: `u32 keyLen ‖ keyLen bytes`.
 * The bytes are XOR-masked, AES-128-ECB wrapped and PKCS#7 padded; the
 * returned seed still carries its fixed 17-byte prefix.
 */
export async function unwrapKeySeed(
  cursor: ByteCursor,
  cipher: BlockCipher,
): Promise<Uint8Array> {
  const keyLen  = await cursor.readUint32LE();
  const wrapped = xorMask(await cursor.readExact(keyLen), KEY_XOR_MASK);
  return pkcs7Unpad(cipher.decryptBlocks(wrapped, coreKey()));
}
