// packages/core/src/container/keystream.ts
import { InvalidKeyMaterialError } from '../errors/index.js';
import { KEY_SEED_PREFIX_BYTES, KEYSTREAM_PERIOD } from '../config/defaults.js';

/** 256-entry permutation of 0..255. Never mutated once built. */
export type KeystreamTable = Uint8Array;

/**
 * Key-scheduling pass: shuffle the identity table, driven by a rolling
 * accumulator and the seed (minus its prefix) repeated cyclically.
 * Every step is a swap, so the result is always a permutation.
 */
export function buildKeystreamTable(seed: Uint8Array): KeystreamTable {
  if (seed.length <= KEY_SEED_PREFIX_BYTES) {
    throw new InvalidKeyMaterialError(
      `Key seed has ${seed.length} bytes; more than ${KEY_SEED_PREFIX_BYTES} required`,
    );
  }
  const effective = seed.subarray(KEY_SEED_PREFIX_BYTES);

  const table = new Uint8Array(KEYSTREAM_PERIOD);
  for (let i = 0; i < KEYSTREAM_PERIOD; i++) table[i] = i;

  let lastByte   = 0;
  let seedOffset = 0;
  for (let i = 0; i < KEYSTREAM_PERIOD; i++) {
    const swapped = table[i];
    const c = (swapped + lastByte + effective[seedOffset]) & 0xff;
    seedOffset = (seedOffset + 1) % effective.length;
    table[i] = table[c];
    table[c] = swapped;
    lastByte = c;
  }
  return table;
}
