// packages/core/src/tags/flac.ts
import { TagWriteError } from '../errors/index.js';
import { concat, encodeUint32BE } from '../util/bytes.js';
import type { CoverPicture } from './picture.js';

const FLAC_MARKER      = [0x66, 0x4c, 0x61, 0x43]; // "fLaC"
const PICTURE_BLOCK    = 6;
const MAX_BLOCK_LENGTH = 0xffffff;

export interface FlacBlock {
  type : number;
  body : Uint8Array;
}

export interface FlacLayout {
  blocks : FlacBlock[];
  /** Audio frames after the last metadata block, untouched */
  frames : Uint8Array;
}

/** Split a FLAC stream into its metadata blocks and frame data. */
export function readFlacBlocks(bytes: Uint8Array): FlacLayout {
  if (bytes.length < 4 || FLAC_MARKER.some((b, i) => bytes[i] !== b)) {
    throw new TagWriteError('Not a FLAC stream: missing fLaC marker');
  }

  const blocks: FlacBlock[] = [];
  let off  = 4;
  let last = false;
  while (!last) {
    if (off + 4 > bytes.length) {
      throw new TagWriteError(`FLAC metadata block header at ${off} runs past the end`);
    }
    const head = bytes[off];
    const len  = (bytes[off + 1] << 16) | (bytes[off + 2] << 8) | bytes[off + 3];
    off += 4;
    if (off + len > bytes.length) {
      throw new TagWriteError(`FLAC metadata block at ${off - 4} runs past the end`);
    }
    last = (head & 0x80) !== 0;
    blocks.push({ type: head & 0x7f, body: bytes.subarray(off, off + len) });
    off += len;
  }
  return { blocks, frames: bytes.subarray(off) };
}

/** Serialise blocks and frames; the last-block flag is set on the final block only. */
export function writeFlacBlocks({ blocks, frames }: FlacLayout): Uint8Array {
  if (blocks.length === 0) throw new TagWriteError('FLAC stream needs at least one metadata block');

  const parts: Uint8Array[] = [Uint8Array.from(FLAC_MARKER)];
  blocks.forEach((block, i) => {
    const len = block.body.length;
    if (len > MAX_BLOCK_LENGTH) {
      throw new TagWriteError(`FLAC metadata block of ${len} bytes exceeds ${MAX_BLOCK_LENGTH}`);
    }
    const flag = i === blocks.length - 1 ? 0x80 : 0;
    parts.push(Uint8Array.of(flag | block.type, len >>> 16, (len >>> 8) & 0xff, len & 0xff), block.body);
  });
  parts.push(frames);
  return concat(...parts);
}

/** PICTURE block body. Width, height, depth and palette size are left 0 (unknown). */
export function encodePictureBlock(pic: CoverPicture): Uint8Array {
  const enc  = new TextEncoder();
  const mime = enc.encode(pic.mime);
  const desc = enc.encode(pic.description);
  return concat(
    encodeUint32BE(pic.pictureType),
    encodeUint32BE(mime.length), mime,
    encodeUint32BE(desc.length), desc,
    encodeUint32BE(0), encodeUint32BE(0), encodeUint32BE(0), encodeUint32BE(0),
    encodeUint32BE(pic.data.length), pic.data,
  );
}

/**
 * Replace every PICTURE block with `pic`, placed after the remaining
 * metadata blocks. Frame data is copied through unchanged.
 */
export function setFlacPicture(bytes: Uint8Array, pic: CoverPicture): Uint8Array {
  const { blocks, frames } = readFlacBlocks(bytes);
  const kept = blocks.filter(b => b.type !== PICTURE_BLOCK);
  kept.push({ type: PICTURE_BLOCK, body: encodePictureBlock(pic) });
  return writeFlacBlocks({ blocks: kept, frames });
}
