// packages/core/src/decoder/ContainerDecoder.ts
import { ByteCursor } from '../util/ByteCursor.js';
import { ByteSource, type RandomAccessSource } from '../util/ByteSource.js';
import { collectStream } from '../util/stream.js';
import { AES128ECB, type BlockCipher } from '../algorithms/cipher/AES128ECB.js';
import { unwrapKeySeed } from '../container/key.js';
import { buildKeystreamTable, type KeystreamTable } from '../container/keystream.js';
import { unwrapMetadata, resolveFormat, type MetadataTree } from '../container/metadata.js';
import { extractCover } from '../container/cover.js';
import { DescrambleTransform } from '../stream/DescrambleTransform.js';
import { CHUNK_SIZE, GAP_BYTES, HEADER_BYTES, MAGIC } from '../config/defaults.js';
import { InvalidHeaderError } from '../errors/index.js';
import { createLogger, type Logger, type Verbosity } from '../util/logger.js';

/**
 * Options for configuring decoder behavior.
 */
export interface DecoderOptions {
  /** Reject containers whose first 8 bytes are not `CTENFDAM` (default false) */
  strictHeader?  : boolean;
  /** Extension used when the metadata block is empty; unset means fail */
  defaultFormat? : string;
  /** Verbosity level 0-4 for logging (0 = errors only) */
  verbose?       : Verbosity;
  /** Optional custom logger callback (receives formatted messages) */
  logger?        : (msg: string) => void;
  /** Block-cipher service; AES-128-ECB unless overridden */
  cipher?        : BlockCipher;
}

export type DecodeState =
  | 'Header'
  | 'KeyBlock'
  | 'MetaBlock'
  | 'Gap'
  | 'CoverBlock'
  | 'AudioPayload'
  | 'Done';

const ORDER: readonly DecodeState[] = [
  'Header', 'KeyBlock', 'MetaBlock', 'Gap', 'CoverBlock', 'AudioPayload', 'Done',
];

/**
 * Everything known about a container once its fixed regions are parsed.
 * The audio payload itself is only read when {@link payloadStream} is consumed.
 */
export interface DecodedContainer {
  metadata      : MetadataTree | null;
  /** Lower-case output extension, resolved before any payload byte is read */
  format        : string;
  cover         : Uint8Array | null;
  payloadOffset : number;
  payloadLength : number;
  payloadStream(): ReadableStream<Uint8Array>;
}

/** Fully decoded in-memory container. */
export interface DecodedBuffer {
  metadata : MetadataTree | null;
  format   : string;
  cover    : Uint8Array | null;
  audio    : Uint8Array;
}

/**
 * Drives a {@link ByteCursor} through the container regions in their fixed
 * order. Any failure aborts the decode; nothing is retried.
 */
export class NcmDecoder {
  private readonly cipher : BlockCipher;
  private readonly log    : Logger;
  private readonly strictHeader  : boolean;
  private readonly defaultFormat : string | undefined;

  constructor(opt: DecoderOptions = {}) {
    this.cipher        = opt.cipher ?? new AES128ECB();
    this.strictHeader  = opt.strictHeader ?? false;
    this.defaultFormat = opt.defaultFormat;
    this.log           = createLogger(opt.verbose ?? 0, opt.logger);
  }

  /**
   * Parse header, key, metadata, gap and cover regions.
   * @param src - Container bytes; must stay readable while the payload is streamed
   */
  async open(src: RandomAccessSource): Promise<DecodedContainer> {
    const cursor = new ByteCursor(src);
    let state: DecodeState = 'Header';
    const enter = (next: DecodeState) => {
      if (ORDER.indexOf(next) !== ORDER.indexOf(state) + 1) {
        throw new Error(`Illegal decoder transition ${state} → ${next}`);
      }
      state = next;
      this.log.log(4, `state ${next} at offset ${cursor.position}`);
    };

    // Header
    if (this.strictHeader) {
      await this.checkMagic(cursor);
      cursor.skip(HEADER_BYTES - MAGIC.length);
    } else {
      cursor.skip(HEADER_BYTES);
    }

    enter('KeyBlock');
    const seed  = await unwrapKeySeed(cursor, this.cipher);
    const table = buildKeystreamTable(seed);
    this.log.log(3, `Key seed unwrapped: ${seed.length} bytes`);

    enter('MetaBlock');
    const metadata = await unwrapMetadata(cursor, this.cipher);
    const format   = resolveFormat(metadata, this.defaultFormat);
    this.log.log(2, metadata === null
      ? `No metadata; using default format ${format}`
      : `Metadata parsed; format ${format}`);

    enter('Gap');
    cursor.skip(GAP_BYTES);

    enter('CoverBlock');
    const cover = await extractCover(cursor);
    this.log.log(3, `Cover: ${cover ? `${cover.length} bytes` : 'none'}`);

    enter('AudioPayload');
    const payloadOffset = cursor.position;
    const payloadLength = cursor.remaining;
    this.log.log(3, `Audio payload: ${payloadLength} bytes at offset ${payloadOffset}`);

    enter('Done');
    return {
      metadata,
      format,
      cover,
      payloadOffset,
      payloadLength,
      payloadStream: () => payloadStream(src, payloadOffset, table),
    };
  }

  /**
   * Decode a container held in memory (or a Blob) in one call.
   * Prefer {@link open} + {@link DecodedContainer.payloadStream} for files.
   */
  async decode(input: Uint8Array | Blob): Promise<DecodedBuffer> {
    const c     = await this.open(new ByteSource(input));
    const audio = await collectStream(c.payloadStream());
    this.log.log(1, `Decoded ${audio.length} bytes of ${c.format} audio`);
    return { metadata: c.metadata, format: c.format, cover: c.cover, audio };
  }

  private async checkMagic(cursor: ByteCursor): Promise<void> {
    const head = await cursor.readExact(MAGIC.length);
    for (let i = 0; i < MAGIC.length; i++) {
      if (head[i] !== MAGIC[i]) {
        throw new InvalidHeaderError('Invalid input format. Magic bytes do not match.');
      }
    }
  }
}

/** Read the payload in {@link CHUNK_SIZE} slices and descramble it lazily. */
function payloadStream(
  src: RandomAccessSource,
  offset: number,
  table: KeystreamTable,
): ReadableStream<Uint8Array> {
  let pos = offset;
  const raw = new ReadableStream<Uint8Array>({
    async pull(ctl) {
      const len = Math.min(CHUNK_SIZE, src.length - pos);
      if (len <= 0) {
        ctl.close();
        return;
      }
      const chunk = await src.read(pos, len);
      pos += len;
      ctl.enqueue(chunk);
    },
  }, { highWaterMark: 1 });
  return raw.pipeThrough(new DescrambleTransform(table).toTransformStream());
}
