// packages/core/src/config/defaults.ts

/** `CTENFDAM`, the first 8 of the 10 header bytes. */
export const MAGIC = new Uint8Array([0x43, 0x54, 0x45, 0x4e, 0x46, 0x44, 0x41, 0x4d]);

export const HEADER_BYTES = 10;

/** Fixed text prefix of the unwrapped key seed (`neteasecloudmusic`). */
export const KEY_SEED_PREFIX_BYTES = 17;

/** `163 key(Don't modify):` in front of the Base64 metadata text. */
export const META_TEXT_PREFIX_BYTES = 22;

/** `music:` in front of the metadata JSON. */
export const META_JSON_PREFIX_BYTES = 6;

/** CRC32 (4) + reserved (5) between metadata and cover. */
export const GAP_BYTES = 9;

export const KEYSTREAM_PERIOD = 256;

/**
 * Payload block size. The keystream index restarts at every block, so this
 * must stay a multiple of {@link KEYSTREAM_PERIOD}.
 */
export const CHUNK_SIZE = 0x8000;

export const COVER_EXTENSION = 'jpg';
