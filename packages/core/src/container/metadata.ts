// packages/core/src/container/metadata.ts
import type { ByteCursor } from '../util/ByteCursor.js';
import type { BlockCipher } from '../algorithms/cipher/AES128ECB.js';
import { pkcs7Unpad } from '../algorithms/padding/pkcs7.js';
import { metaKey, META_XOR_MASK } from '../config/keys.js';
import { META_JSON_PREFIX_BYTES, META_TEXT_PREFIX_BYTES } from '../config/defaults.js';
import { base64Decode, xorMask } from '../util/bytes.js';
import { JsonParseError, MissingFormatFieldError } from '../errors/index.js';

/** Parsed metadata JSON object. Only `format` is required to decode. */
export type MetadataTree = Record<string, unknown>;

/** Typed subset of the fields the streaming client usually writes. */
export interface TrackInfo {
  title?   : string;
  artists  : string[];
  album?   : string;
  bitrate? : number;
  /** Milliseconds */
  duration?: number;
}

const latin1 = new TextDecoder('latin1');
const utf8   = new TextDecoder('utf-8');

/**
 * Metadata block: `u32 metaLen ‖ metaLen bytes`.
 * Returns `null` when `metaLen` is zero.
 */
export async function unwrapMetadata(
  cursor: ByteCursor,
  cipher: BlockCipher,
): Promise<MetadataTree | null> {
  const metaLen = await cursor.readUint32LE();
  if (metaLen === 0) return null;

  const masked = xorMask(await cursor.readExact(metaLen), META_XOR_MASK);
  const b64    = latin1.decode(masked.subarray(META_TEXT_PREFIX_BYTES));
  const plain  = pkcs7Unpad(cipher.decryptBlocks(base64Decode(b64), metaKey()));

  return parseMetadataJson(utf8.decode(plain.subarray(META_JSON_PREFIX_BYTES)));
}

export function parseMetadataJson(text: string): MetadataTree {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new JsonParseError(
      `Metadata is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!isObject(value)) {
    throw new JsonParseError('Metadata JSON is not an object');
  }
  return value;
}

/**
 * Output extension from the metadata `format` field, lower-cased.
 * Absent metadata falls back to `defaultFormat` when one is configured.
 */
export function resolveFormat(
  metadata: MetadataTree | null,
  defaultFormat?: string,
): string {
  if (metadata === null) {
    if (defaultFormat === undefined) {
      throw new MissingFormatFieldError('Container has no metadata and no default format is configured');
    }
    return checkExtension(defaultFormat);
  }
  const format = metadata.format;
  if (typeof format !== 'string') {
    throw new MissingFormatFieldError('Metadata has no "format" string');
  }
  return checkExtension(format);
}

export function trackInfo(metadata: MetadataTree | null): TrackInfo {
  if (metadata === null) return { artists: [] };

  // artist: [[name, id], ...]
  const artists: string[] = [];
  if (Array.isArray(metadata.artist)) {
    for (const entry of metadata.artist) {
      if (Array.isArray(entry) && typeof entry[0] === 'string') artists.push(entry[0]);
    }
  }
  return {
    title   : optionalString(metadata.musicName),
    artists,
    album   : optionalString(metadata.album),
    bitrate : optionalNumber(metadata.bitrate),
    duration: optionalNumber(metadata.duration),
  };
}

function checkExtension(raw: string): string {
  const ext = raw.trim().toLowerCase();
  if (!/^[a-z0-9]+$/.test(ext)) {
    throw new MissingFormatFieldError(`Unusable format "${raw}"`);
  }
  return ext;
}

function isObject(v: unknown): v is MetadataTree {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function optionalString(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

function optionalNumber(v: unknown): number | undefined {
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}
