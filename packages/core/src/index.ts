// packages/core/src/index.ts

export {
  NcmDecoder,
  type DecoderOptions,
  type DecodedContainer,
  type DecodeState,
  type DecodedBuffer,
} from './decoder/ContainerDecoder.js';

export { ByteCursor }                            from './util/ByteCursor.js';
export { ByteSource, type RandomAccessSource }   from './util/ByteSource.js';
export { AES128ECB, type BlockCipher }           from './algorithms/cipher/AES128ECB.js';
export { pkcs7Unpad }                            from './algorithms/padding/pkcs7.js';
export { unwrapKeySeed }                         from './container/key.js';
export { buildKeystreamTable, type KeystreamTable } from './container/keystream.js';
export {
  unwrapMetadata,
  parseMetadataJson,
  resolveFormat,
  trackInfo,
  type MetadataTree,
  type TrackInfo,
} from './container/metadata.js';
export { extractCover }                          from './container/cover.js';
export { DescrambleTransform, descrambleChunk }  from './stream/DescrambleTransform.js';
export {
  readFlacBlocks,
  writeFlacBlocks,
  encodePictureBlock,
  setFlacPicture,
  type FlacBlock,
  type FlacLayout,
} from './tags/flac.js';
export { frontCover, sniffImageMime, FRONT_COVER, type CoverPicture } from './tags/picture.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
export { collectStream }                         from './util/stream.js';
export * from './errors/index.js';
export * as layout from './config/defaults.js';
