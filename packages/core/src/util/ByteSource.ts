// packages/core/src/util/ByteSource.ts

/**
 * Anything that can hand out byte slices by absolute offset.
 * File-backed implementations live in the runtime packages.
 */
export interface RandomAccessSource {
  readonly length: number;
  read(offset: number, len: number): Promise<Uint8Array>;
}

/**
 * Unified accessor for Blob | Uint8Array.
 * Slices are read on-demand so large Blobs are handled
 * without loading them fully into memory.
 */
export class ByteSource implements RandomAccessSource {
  constructor(private readonly src: Blob | Uint8Array) {}

  /** Total byte length of the underlying data */
  get length(): number {
    return this.src instanceof Uint8Array ? this.src.byteLength : this.src.size;
  }

  /**
   * Read a slice *[offset, offset + len)* as Uint8Array.
   * The returned view is a fresh copy — safe to mutate by caller.
   */
  async read(offset: number, len: number): Promise<Uint8Array> {
    if (offset < 0 || len < 0 || offset + len > this.length) {
      throw new RangeError('read() slice exceeds data bounds');
    }

    if (this.src instanceof Uint8Array) {
      return this.src.slice(offset, offset + len);
    }

    const buf = await this.src.slice(offset, offset + len).arrayBuffer();
    return new Uint8Array(buf);
  }
}
