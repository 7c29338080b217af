/* ------------------------------------------------------------------
   Builds synthetic containers in-process for the decoder tests
   ------------------------------------------------------------------ */
import { ecb } from '@noble/ciphers/aes.js';
import { coreKey, metaKey, KEY_XOR_MASK, META_XOR_MASK } from '../src/config/keys.js';
import { CHUNK_SIZE, MAGIC } from '../src/config/defaults.js';
import { base64Encode, concat, encodeUint32LE, xorMask } from '../src/util/bytes.js';
import { buildKeystreamTable, type KeystreamTable } from '../src/container/keystream.js';
import { descrambleChunk } from '../src/stream/DescrambleTransform.js';

const enc = new TextEncoder();

export const SEED_PREFIX    = enc.encode('neteasecloudmusic');
export const TEST_SEED_TAIL = enc.encode('test-seed-0123456789abcdef');
export const META_PREFIX    = "163 key(Don't modify):";

export const SAMPLE_METADATA = {
  musicId: 1234,
  musicName: 'Test Track',
  artist: [['Test Artist', 42], ['Guest', 7]],
  album: 'Test Album',
  bitrate: 320000,
  duration: 215000,
  format: 'mp3',
};

export interface FixtureOptions {
  seedTail? : Uint8Array;
  /** Raw key block bytes, overriding the wrapped seed */
  keyBlock? : Uint8Array;
  /** `null` writes a zero-length metadata block */
  metadata? : Record<string, unknown> | null;
  /** Raw metadata block bytes, overriding `metadata` */
  metaBlock?: Uint8Array;
  cover?    : Uint8Array | null;
  audio?    : Uint8Array;
  magic?    : Uint8Array;
}

export interface Fixture {
  bytes         : Uint8Array;
  table         : KeystreamTable;
  audio         : Uint8Array;
  keyBlockLen   : number;
  metaBlockLen  : number;
  payloadOffset : number;
}

export function sampleAudio(len: number): Uint8Array {
  return Uint8Array.from({ length: len }, (_, i) => (i * 31 + 7) & 0xff);
}

export function wrapKey(seed: Uint8Array): Uint8Array {
  return xorMask(ecb(coreKey()).encrypt(seed), KEY_XOR_MASK);
}

export function wrapMetadataText(jsonText: string): Uint8Array {
  const cipher = ecb(metaKey()).encrypt(enc.encode('music:' + jsonText));
  return xorMask(enc.encode(META_PREFIX + base64Encode(cipher)), META_XOR_MASK);
}

/** Block-wise keystream XOR, the same shape the decoder reads. */
export function scramble(table: KeystreamTable, plain: Uint8Array): Uint8Array {
  const parts: Uint8Array[] = [];
  for (let off = 0; off < plain.length; off += CHUNK_SIZE) {
    parts.push(descrambleChunk(table, plain.subarray(off, off + CHUNK_SIZE)));
  }
  return concat(...parts);
}

export function buildContainer(opt: FixtureOptions = {}): Fixture {
  const seed  = concat(SEED_PREFIX, opt.seedTail ?? TEST_SEED_TAIL);
  // A prefix-only seed has no table; the decoder must reject it before the payload.
  const table = seed.length > SEED_PREFIX.length
    ? buildKeystreamTable(seed)
    : Uint8Array.from({ length: 256 }, (_, i) => i);
  const audio = opt.audio ?? sampleAudio(70_000);
  const cover = opt.cover ?? null;

  const keyBlock  = opt.keyBlock ?? wrapKey(seed);
  const metadata  = opt.metadata === undefined ? SAMPLE_METADATA : opt.metadata;
  const metaBlock = opt.metaBlock
    ?? (metadata === null ? new Uint8Array(0) : wrapMetadataText(JSON.stringify(metadata)));
  const gap       = new Uint8Array(9).fill(0xaa);
  const coverLen  = cover ? cover.length : 0;

  const head = concat(
    opt.magic ?? MAGIC, Uint8Array.of(0x01, 0x70),
    encodeUint32LE(keyBlock.length), keyBlock,
    encodeUint32LE(metaBlock.length), metaBlock,
    gap,
    encodeUint32LE(coverLen), cover ?? new Uint8Array(0),
  );

  return {
    bytes: concat(head, scramble(table, audio)),
    table,
    audio,
    keyBlockLen: keyBlock.length,
    metaBlockLen: metaBlock.length,
    payloadOffset: head.length,
  };
}
