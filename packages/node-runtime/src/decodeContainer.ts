// packages/node-runtime/src/decodeContainer.ts
import { NcmDecoder, type DecoderOptions } from '../../core/src/decoder/ContainerDecoder.js';
import type { MetadataTree } from '../../core/src/container/metadata.js';
import { COVER_EXTENSION } from '../../core/src/config/defaults.js';
import { FileByteSource } from './FileByteSource.js';
import { canEmbedCover, embedCover } from './embedCover.js';
import { commitAll, discardAll, stageFile, stageStream, type StagedOutput } from './output.js';

export interface DecodeOptions extends DecoderOptions {
  /**
   * Put the cover into the audio's own tags instead of `<base>.jpg`.
   * Only MP3 and FLAC can carry it; other formats still get the .jpg.
   */
  embedCover? : boolean;
}

export interface DecodeResult {
  input         : string;
  audioPath     : string;
  /** `null` when there is no cover or it was embedded */
  coverPath     : string | null;
  coverEmbedded : boolean;
  format        : string;
  metadata      : MetadataTree | null;
  /** Descrambled payload bytes, before any tag is added */
  bytesWritten  : number;
}

/**
 * Decode one container file.
 *
 * Writes `<outputBasePath>.<format>` and, when the container carries a cover,
 * `<outputBasePath>.jpg`. The extension is appended, never substituted.
 * Every output is staged first and moved into place together, so a failed
 * decode leaves none of them behind.
 */
export async function decodeContainer(
  inputPath: string,
  outputBasePath: string,
  options: DecodeOptions = {},
): Promise<DecodeResult> {
  const src    = await FileByteSource.open(inputPath);
  const staged : StagedOutput[] = [];
  try {
    const container = await new NcmDecoder(options).open(src);

    const audioPath = `${outputBasePath}.${container.format}`;
    const audio     = await stageStream(audioPath, container.payloadStream());
    staged.push(audio.staged);

    let coverPath: string | null = null;
    let coverEmbedded = false;
    if (container.cover) {
      if (options.embedCover && canEmbedCover(container.format)) {
        await embedCover(audio.staged.tmp, container.format, container.cover);
        coverEmbedded = true;
      } else {
        coverPath = `${outputBasePath}.${COVER_EXTENSION}`;
        staged.push(await stageFile(coverPath, container.cover));
      }
    }

    await commitAll(staged);

    return {
      input: inputPath,
      audioPath,
      coverPath,
      coverEmbedded,
      format: container.format,
      metadata: container.metadata,
      bytesWritten: audio.bytesWritten,
    };
  } catch (err) {
    await discardAll(staged);
    throw err;
  } finally {
    await src.close();
  }
}
