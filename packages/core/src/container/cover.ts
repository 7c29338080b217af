// packages/core/src/container/cover.ts
import type { ByteCursor } from '../util/ByteCursor.js';

/** Cover block: `u32 imageLen ‖ imageLen raw bytes`, copied verbatim. */
export async function extractCover(cursor: ByteCursor): Promise<Uint8Array | null> {
  const imageLen = await cursor.readUint32LE();
  if (imageLen === 0) return null;
  return cursor.readExact(imageLen);
}
