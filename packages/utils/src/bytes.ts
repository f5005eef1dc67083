// packages/utils/src/bytes.ts

export const U16_MAX = 0xffff;
export const U64_MAX = 0xffff_ffff_ffff_ffffn;

/** Accept hex string, Uint8Array, or number[] and return Uint8Array. */
export function hexToBytes(hex: string | Uint8Array | number[]): Uint8Array {
  if (hex instanceof Uint8Array) return hex; // accept bytes (Buffer too)
  if (Array.isArray(hex)) return Uint8Array.from(hex);

  const h = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (h.length % 2 !== 0) throw new Error('hexToBytes: hex length must be even');
  if (!/^[0-9a-fA-F]*$/.test(h)) throw new Error('hexToBytes: invalid hex characters');

  const out = new Uint8Array(h.length / 2);
  for (let i = 0; i < out.length; i++) out[i] = Number.parseInt(h.slice(i * 2, i * 2 + 2), 16);
  return out;
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/** Concatenate Uint8Array chunks. */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  let totalLen = 0;
  for (const a of arrays) {
    if (!(a instanceof Uint8Array)) {
      throw new TypeError('concat: all chunks must be Uint8Array');
    }
    totalLen += a.length;
  }

  const res = new Uint8Array(totalLen);
  let offset = 0;
  for (const a of arrays) {
    res.set(a, offset);
    offset += a.length;
  }
  return res;
}

export function arraysEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) if (a[i] !== b[i]) return false;
  return true;
}

export function ensureBytesLen(u8: Uint8Array, n: number, label: string): Uint8Array {
  if (!(u8 instanceof Uint8Array) || u8.length !== n) throw new Error(`${label} must be ${n} bytes`);
  return u8;
}

export function isU64(n: bigint): boolean {
  return n >= 0n && n <= U64_MAX;
}

export function uint16le(num: number): Uint8Array {
  if (!Number.isInteger(num) || num < 0 || num > U16_MAX) {
    throw new RangeError(`uint16le: value out of range: ${num}`);
  }
  const buf = new Uint8Array(2);
  buf[0] = num & 0xff;
  buf[1] = (num >> 8) & 0xff;
  return buf;
}

export function uint64le(num: number | bigint): Uint8Array {
  let n = BigInt(num);
  if (!isU64(n)) throw new RangeError(`uint64le: value out of range: ${n}`);

  const buf = new Uint8Array(8);
  for (let i = 0; i < 8; i++) {
    buf[i] = Number(n & 0xffn);
    n >>= 8n;
  }
  return buf;
}

function assertReadable(src: Uint8Array, offset: number, width: number, label: string) {
  if (!Number.isInteger(offset) || offset < 0 || offset + width > src.length) {
    throw new RangeError(`${label}: need ${width} bytes at offset ${offset}, have ${src.length}`);
  }
}

export function readUint16le(src: Uint8Array, offset = 0): number {
  assertReadable(src, offset, 2, 'readUint16le');
  return (src[offset] ?? 0) | ((src[offset + 1] ?? 0) << 8);
}

export function readUint64le(src: Uint8Array, offset = 0): bigint {
  assertReadable(src, offset, 8, 'readUint64le');
  let n = 0n;
  for (let i = 7; i >= 0; i--) {
    n = (n << 8n) | BigInt(src[offset + i] ?? 0);
  }
  return n;
}

export function debugLog(...args: unknown[]): void {
  if (process.env.STAKE_DEBUG) console.log(...args);
}
