// packages/node-runtime/src/FileByteSource.ts
import { open, type FileHandle } from 'node:fs/promises';
import { FilesystemError, TruncatedInputError } from '../../core/src/errors/index.js';
import type { RandomAccessSource } from '../../core/src/util/ByteSource.js';

/**
 * Random-access reader over an open file. Slices are fetched with positional
 * reads, so the file is never loaded as a whole.
 */
export class FileByteSource implements RandomAccessSource {
  private constructor(
    private readonly fh: FileHandle,
    readonly length: number,
    readonly path: string,
  ) {}

  static async open(path: string): Promise<FileByteSource> {
    let fh: FileHandle;
    try {
      fh = await open(path, 'r');
    } catch (err) {
      throw new FilesystemError(`Cannot open ${path}: ${describe(err)}`);
    }
    try {
      const st = await fh.stat();
      if (!st.isFile()) throw new FilesystemError(`Not a regular file: ${path}`);
      return new FileByteSource(fh, st.size, path);
    } catch (err) {
      await fh.close();
      throw err;
    }
  }

  async read(offset: number, len: number): Promise<Uint8Array> {
    if (offset < 0 || len < 0 || offset + len > this.length) {
      throw new RangeError('read() slice exceeds data bounds');
    }
    const out = new Uint8Array(len);
    let done = 0;
    while (done < len) {
      let bytesRead: number;
      try {
        ({ bytesRead } = await this.fh.read(out, done, len - done, offset + done));
      } catch (err) {
        throw new FilesystemError(`Read failed on ${this.path}: ${describe(err)}`);
      }
      if (bytesRead === 0) {
        throw new TruncatedInputError(`${this.path} ended early at offset ${offset + done}`);
      }
      done += bytesRead;
    }
    return out;
  }

  async close(): Promise<void> {
    await this.fh.close();
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
