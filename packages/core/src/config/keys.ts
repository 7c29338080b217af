// packages/core/src/config/keys.ts
import { hexToBytes } from '../util/bytes.js';

const CORE_KEY_HEX = '687A4852416D736F356B496E62617857';
const META_KEY_HEX = '2331346C6A6B5F215C5D2630553C2728';

export const KEY_XOR_MASK  = 0x64;
export const META_XOR_MASK = 0x63;

/** AES-128 key wrapping the keystream seed. Fresh copy on every call. */
export function coreKey(): Uint8Array { return hexToBytes(CORE_KEY_HEX); }

/** AES-128 key wrapping the metadata blob. Fresh copy on every call. */
export function metaKey(): Uint8Array { return hexToBytes(META_KEY_HEX); }
