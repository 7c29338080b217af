// packages/core/src/stream/DescrambleTransform.ts
import type { KeystreamTable } from '../container/keystream.js';
import { CHUNK_SIZE, KEYSTREAM_PERIOD } from '../config/defaults.js';

/**
 * XOR one block with the keystream. The index restarts at 0 for every
 * block; it is not the absolute file offset. Self-inverse.
 */
export function descrambleChunk(table: KeystreamTable, chunk: Uint8Array): Uint8Array {
  const out = new Uint8Array(chunk.length);
  for (let i = 0; i < chunk.length; i++) {
    const j = (i + 1) & 0xff;
    const k = table[(table[j] + table[(table[j] + j) & 0xff]) & 0xff];
    out[i] = chunk[i] ^ k;
  }
  return out;
}

/**
 * TransformStream that:
 *   • collects scrambled payload into fixed-size blocks
 *   • descrambles each block with the block-local index
 *   • flushes the final short block as-is
 */
export class DescrambleTransform {
  private buffer = new Uint8Array(0);

  constructor(
    private readonly table: KeystreamTable,
    private readonly chunkSize = CHUNK_SIZE,
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0 || chunkSize % KEYSTREAM_PERIOD !== 0) {
      throw new RangeError(
        `Chunk size must be a positive multiple of ${KEYSTREAM_PERIOD}, got ${chunkSize}`,
      );
    }
  }

  toTransformStream(): TransformStream<Uint8Array, Uint8Array> {
    return new TransformStream<Uint8Array, Uint8Array>({
      transform: (chunk, ctl) => this.transform(chunk, ctl),
      flush: ctl => this.flush(ctl),
    });
  }

  private transform(
    bytes: Uint8Array,
    ctl: TransformStreamDefaultController<Uint8Array>,
  ): void {
    const combined = new Uint8Array(this.buffer.length + bytes.length);
    combined.set(this.buffer);
    combined.set(bytes, this.buffer.length);

    let offset = 0;
    while (combined.length - offset >= this.chunkSize) {
      ctl.enqueue(descrambleChunk(this.table, combined.subarray(offset, offset + this.chunkSize)));
      offset += this.chunkSize;
    }

    this.buffer = combined.slice(offset);
  }

  private flush(ctl: TransformStreamDefaultController<Uint8Array>): void {
    if (this.buffer.length) ctl.enqueue(descrambleChunk(this.table, this.buffer));
    this.buffer = new Uint8Array(0);
  }
}
