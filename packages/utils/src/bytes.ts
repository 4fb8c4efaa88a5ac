// packages/utils/src/bytes.ts
import { bytesToNumberLE } from '@noble/curves/utils.js';

/** Accept hex string, Uint8Array, or number[] and return Uint8Array. */
export function hexToBytes(hex: string | Uint8Array | number[]): Uint8Array {
  if (hex instanceof Uint8Array) return hex;
  if (Array.isArray(hex)) return Uint8Array.from(hex);

  const h = hex.startsWith('0x') ? hex.slice(2) : hex;
  if (h.length % 2 !== 0) throw new Error('hexToBytes: hex length must be even');
  if (!/^[0-9a-fA-F]*$/.test(h)) throw new Error('hexToBytes: invalid hex character');
  if (h.length === 0) return new Uint8Array();

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
  for (const a of arrays) totalLen += a.length;

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

export function reverseBytes(bytes: Uint8Array): Uint8Array {
  const rev = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) rev[i] = bytes[bytes.length - 1 - i];
  return rev;
}

export function isAllZero(bytes: Uint8Array): boolean {
  for (const b of bytes) if (b !== 0) return false;
  return true;
}

function assertReadable(bytes: Uint8Array, pos: number, len: number, label: string): void {
  if (!Number.isInteger(pos) || pos < 0 || pos + len > bytes.length) {
    throw new RangeError(`${label}: read of ${len} bytes at ${pos} overruns buffer of ${bytes.length}`);
  }
}

export function readU16BE(bytes: Uint8Array, pos: number): number {
  assertReadable(bytes, pos, 2, 'readU16BE');
  return (bytes[pos] << 8) | bytes[pos + 1];
}

export function readU32LE(bytes: Uint8Array, pos: number): number {
  assertReadable(bytes, pos, 4, 'readU32LE');
  return (
    bytes[pos] |
    (bytes[pos + 1] << 8) |
    (bytes[pos + 2] << 16) |
    (bytes[pos + 3] << 24)
  ) >>> 0;
}

export function readU64LE(bytes: Uint8Array, pos: number): bigint {
  assertReadable(bytes, pos, 8, 'readU64LE');
  return bytesToNumberLE(bytes.subarray(pos, pos + 8));
}

export function uint16be(num: number): Uint8Array {
  return new Uint8Array([(num >> 8) & 0xff, num & 0xff]);
}

export function uint32le(num: number): Uint8Array {
  const buf = new Uint8Array(4);
  buf[0] = num & 0xff;
  buf[1] = (num >> 8) & 0xff;
  buf[2] = (num >> 16) & 0xff;
  buf[3] = (num >> 24) & 0xff;
  return buf;
}

export function uint64le(num: number | bigint): Uint8Array {
  const buf = new Uint8Array(8);
  let n = BigInt(num);
  for (let i = 0; i < 8; i++) {
    buf[i] = Number(n & 0xffn);
    n >>= 8n;
  }
  return buf;
}
