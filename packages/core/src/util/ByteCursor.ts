// packages/core/src/util/ByteCursor.ts
import { TruncatedInputError } from '../errors/index.js';
import type { RandomAccessSource } from './ByteSource.js';
import { readUint32LE } from './bytes.js';

/**
 * Forward-only reader over a {@link RandomAccessSource}.
 * Only lengths are checked here, never content.
 */
export class ByteCursor {
  #pos = 0;

  constructor(private readonly src: RandomAccessSource) {}

  get position(): number  { return this.#pos; }
  get remaining(): number { return this.src.length - this.#pos; }

  skip(n: number): void {
    this.ensure(n);
    this.#pos += n;
  }

  async readExact(n: number): Promise<Uint8Array> {
    this.ensure(n);
    const out = await this.src.read(this.#pos, n);
    this.#pos += n;
    return out;
  }

  async readUint32LE(): Promise<number> {
    return readUint32LE(await this.readExact(4));
  }

  private ensure(n: number): void {
    if (!Number.isInteger(n) || n < 0) {
      throw new RangeError(`Invalid read length ${n}`);
    }
    if (n > this.remaining) {
      throw new TruncatedInputError(
        `Need ${n} bytes at offset ${this.#pos}, only ${this.remaining} remain`,
      );
    }
  }
}
