import { buildKeystreamTable } from '../../src/container/keystream.js';
import { InvalidKeyMaterialError } from '../../src/errors/index.js';
import { concat } from '../../src/util/bytes.js';
import { SEED_PREFIX, TEST_SEED_TAIL } from '../fixture.js';

const isPermutation = (t: Uint8Array) =>
  t.length === 256 && new Set(t).size === 256;

describe('buildKeystreamTable', () => {
  it('produces the expected table for a known seed', () => {
    const t = buildKeystreamTable(concat(SEED_PREFIX, TEST_SEED_TAIL));
    expect(Array.from(t.subarray(0, 8))).toEqual([116, 218, 69, 193, 247, 111, 221, 70]);
  });

  it('cycles a one-byte effective seed', () => {
    const t = buildKeystreamTable(concat(SEED_PREFIX, Uint8Array.of(0)));
    expect(Array.from(t.subarray(0, 8))).toEqual([0, 35, 3, 43, 9, 11, 65, 229]);
  });

  it('always yields a permutation of 0..255', () => {
    for (let len = 1; len <= 64; len += 7) {
      const tail = Uint8Array.from({ length: len }, (_, i) => (i * 97 + len) & 0xff);
      expect(isPermutation(buildKeystreamTable(concat(SEED_PREFIX, tail)))).toBe(true);
    }
    expect(isPermutation(buildKeystreamTable(new Uint8Array(300).fill(0xff)))).toBe(true);
  });

  it('is deterministic and seed-sensitive', () => {
    const a = buildKeystreamTable(concat(SEED_PREFIX, Uint8Array.of(1, 2, 3)));
    const b = buildKeystreamTable(concat(SEED_PREFIX, Uint8Array.of(1, 2, 3)));
    const c = buildKeystreamTable(concat(SEED_PREFIX, Uint8Array.of(1, 2, 4)));
    expect(Array.from(a)).toEqual(Array.from(b));
    expect(Array.from(a)).not.toEqual(Array.from(c));
  });

  it('ignores the 17-byte prefix', () => {
    const a = buildKeystreamTable(concat(SEED_PREFIX, Uint8Array.of(5, 6)));
    const b = buildKeystreamTable(concat(new Uint8Array(17), Uint8Array.of(5, 6)));
    expect(Array.from(a)).toEqual(Array.from(b));
  });

  it('rejects seeds of 17 bytes or fewer', () => {
    expect(() => buildKeystreamTable(SEED_PREFIX)).toThrow(InvalidKeyMaterialError);
    expect(() => buildKeystreamTable(new Uint8Array(0))).toThrow(InvalidKeyMaterialError);
  });
});
