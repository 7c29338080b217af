import { Base64DecodeError, DecodingError } from '../errors/index.js';

/* ------------------------------------------------------------------ */

export function concat(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.byteLength, 0);
  const out   = new Uint8Array(total);
  let offset  = 0;
  for (const c of chunks) {
    out.set(c, offset);
    offset += c.byteLength;
  }
  return out;
}

/* ----------  Base64  ---------------------------------------------- */
export function base64Encode(...chunks: Uint8Array[]): string {
  return Buffer.from(concat(...chunks)).toString('base64');
}

export function base64Decode(b64: string): Uint8Array {
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(b64) || b64.length % 4 !== 0) {
    throw new Base64DecodeError(
      `Invalid Base64: length=${b64.length}, content='${b64.slice(0, 12)}…'`,
    );
  }
  return new Uint8Array(Buffer.from(b64, 'base64'));
}

/* ----------  Hex  ------------------------------------------------- */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0 || !/^[0-9A-Fa-f]*$/.test(hex)) {
    throw new DecodingError(`Invalid hex string of length ${hex.length}`);
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

/* ----------  Integers  -------------------------------------------- */
export function readUint32LE(buf: Uint8Array, off = 0): number {
  if (buf.length - off < 4) {
    throw new RangeError('Not enough bytes for a 32-bit integer');
  }
  return new DataView(buf.buffer, buf.byteOffset + off, 4).getUint32(0, true);
}

export function encodeUint32LE(n: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, n, true);
  return out;
}

export function encodeUint32BE(n: number): Uint8Array {
  const out = new Uint8Array(4);
  new DataView(out.buffer).setUint32(0, n, false);
  return out;
}

/** XOR every byte with `mask`, in place. */
export function xorMask(buf: Uint8Array, mask: number): Uint8Array {
  for (let i = 0; i < buf.length; i++) buf[i] ^= mask;
  return buf;
}
