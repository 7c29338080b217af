// packages/node-runtime/src/embedCover.ts
import { readFile, writeFile } from 'node:fs/promises';
import NodeID3 from 'node-id3';
import { OutputWriteError, TagWriteError } from '../../core/src/errors/index.js';
import { setFlacPicture } from '../../core/src/tags/flac.js';
import { frontCover, type CoverPicture } from '../../core/src/tags/picture.js';

const EMBEDDABLE = new Set(['mp3', 'flac']);

export function canEmbedCover(format: string): boolean {
  return EMBEDDABLE.has(format);
}

/**
 * Rewrite the audio file at `path` (a staged temp file) so it carries
 * `cover` as its front-cover picture: an APIC frame for MP3, a PICTURE
 * block for FLAC. The whole file is read into memory.
 */
export async function embedCover(path: string, format: string, cover: Uint8Array): Promise<void> {
  if (!canEmbedCover(format)) {
    throw new TagWriteError(`Cannot embed a cover into .${format} files`);
  }

  let audio: Buffer;
  try {
    audio = await readFile(path);
  } catch (err) {
    throw new OutputWriteError(`Cannot reread ${path}: ${describe(err)}`);
  }

  const pic    = frontCover(cover);
  const tagged = format === 'mp3' ? tagMp3(audio, pic) : setFlacPicture(audio, pic);

  try {
    await writeFile(path, tagged);
  } catch (err) {
    throw new OutputWriteError(`Cannot rewrite ${path}: ${describe(err)}`);
  }
}

/** Existing ID3 frames are kept; any previous picture is replaced. */
function tagMp3(audio: Buffer, pic: CoverPicture): Buffer {
  try {
    return NodeID3.update({
      image: {
        mime: pic.mime,
        type: { id: pic.pictureType, name: 'front cover' },
        description: pic.description,
        imageBuffer: Buffer.from(pic.data),
      },
    }, audio);
  } catch (err) {
    throw new TagWriteError(`ID3 tagging failed: ${describe(err)}`);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
