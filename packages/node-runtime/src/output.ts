// packages/node-runtime/src/output.ts
import { mkdir, open, rename, rm, type FileHandle } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { basename, dirname, join } from 'node:path';
import { OutputWriteError } from '../../core/src/errors/index.js';

/**
 * A fully written temp file waiting to be moved onto `target`.
 * Nothing appears at `target` until {@link commitAll} succeeds.
 */
export interface StagedOutput {
  readonly target : string;
  readonly tmp    : string;
}

/**
 * Write into a hidden sibling temp file. On any failure the temp file is
 * removed and the original error is rethrown.
 */
async function stage<T>(
  target: string,
  write: (fh: FileHandle) => Promise<T>,
): Promise<{ staged: StagedOutput; result: T }> {
  const dir = dirname(target);
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new OutputWriteError(`Cannot create directory ${dir}: ${describe(err)}`);
  }

  const tmp = join(dir, `.${basename(target)}.${randomUUID()}.part`);
  let fh: FileHandle;
  try {
    fh = await open(tmp, 'wx');
  } catch (err) {
    throw new OutputWriteError(`Cannot create ${tmp}: ${describe(err)}`);
  }

  let result: T;
  try {
    result = await write(fh);
  } catch (err) {
    // the write error wins over a failing close; the temp file goes either way
    await Promise.allSettled([fh.close()]);
    await rm(tmp, { force: true });
    throw err;
  }

  try {
    await fh.close();
  } catch (err) {
    await rm(tmp, { force: true });
    throw new OutputWriteError(`Cannot finish ${target}: ${describe(err)}`);
  }
  return { staged: { target, tmp }, result };
}

async function writeAll(fh: FileHandle, bytes: Uint8Array, target: string): Promise<void> {
  try {
    await fh.write(bytes);
  } catch (err) {
    throw new OutputWriteError(`Write to ${target} failed: ${describe(err)}`);
  }
}

export async function stageFile(target: string, data: Uint8Array): Promise<StagedOutput> {
  const { staged } = await stage(target, fh => writeAll(fh, data, target));
  return staged;
}

/**
 * Drain `rs` into a staged temp file. Errors raised by the stream itself
 * (decoding errors) propagate unchanged; on any other failure the stream
 * is cancelled.
 */
export async function stageStream(
  target: string,
  rs: ReadableStream<Uint8Array>,
): Promise<{ staged: StagedOutput; bytesWritten: number }> {
  const reader = rs.getReader();
  let streamFailed = false;
  try {
    const { staged, result } = await stage(target, async fh => {
      let written = 0;
      while (true) {
        let chunk: ReadableStreamReadResult<Uint8Array>;
        try {
          chunk = await reader.read();
        } catch (err) {
          streamFailed = true;
          throw err;
        }
        if (chunk.done) break;
        await writeAll(fh, chunk.value, target);
        written += chunk.value.byteLength;
      }
      return written;
    });
    return { staged, bytesWritten: result };
  } catch (err) {
    if (!streamFailed) await reader.cancel(describe(err));
    throw err;
  } finally {
    reader.releaseLock();
  }
}

/** Remove staged temp files that will not be committed. */
export async function discardAll(staged: readonly StagedOutput[]): Promise<void> {
  await Promise.all(staged.map(s => rm(s.tmp, { force: true })));
}

/**
 * Move every staged file onto its target, in order. If one rename fails,
 * targets already moved in this call are removed and the remaining temp
 * files are discarded, so either all outputs appear or none do.
 */
export async function commitAll(staged: readonly StagedOutput[]): Promise<void> {
  const moved: string[] = [];
  for (const [i, s] of staged.entries()) {
    try {
      await rename(s.tmp, s.target);
    } catch (err) {
      await Promise.all(moved.map(t => rm(t, { force: true })));
      await discardAll(staged.slice(i));
      throw new OutputWriteError(`Cannot move output into place at ${s.target}: ${describe(err)}`);
    }
    moved.push(s.target);
  }
}

export async function writeFileAtomic(target: string, data: Uint8Array): Promise<void> {
  await commitAll([await stageFile(target, data)]);
}

/** @returns Number of bytes written */
export async function writeStreamAtomic(
  target: string,
  rs: ReadableStream<Uint8Array>,
): Promise<number> {
  const { staged, bytesWritten } = await stageStream(target, rs);
  await commitAll([staged]);
  return bytesWritten;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
