// packages/utils/src/varint.ts

export type DecodedVarInt = { value: number; length: number };

export function varInt(val: number): Uint8Array {
  if (!Number.isSafeInteger(val) || val < 0) throw new Error('varInt: val must be a non-negative integer');

  if (val < 0xfd) return new Uint8Array([val]);

  if (val <= 0xffff) {
    const b = new Uint8Array(3);
    b[0] = 0xfd;
    new DataView(b.buffer).setUint16(1, val, true);
    return b;
  }

  if (val <= 0xffffffff) {
    const b = new Uint8Array(5);
    b[0] = 0xfe;
    new DataView(b.buffer).setUint32(1, val, true);
    return b;
  }

  const b = new Uint8Array(9);
  b[0] = 0xff;
  new DataView(b.buffer).setBigUint64(1, BigInt(val), true);
  return b;
}

export function decodeVarInt(u8: Uint8Array, offset = 0): DecodedVarInt {
  if (!Number.isInteger(offset) || offset < 0 || offset >= u8.length) {
    throw new RangeError(`decodeVarInt: offset ${offset} outside buffer of ${u8.length}`);
  }

  const fb = u8[offset];
  if (fb < 0xfd) return { value: fb, length: 1 };

  const size = fb === 0xfd ? 3 : fb === 0xfe ? 5 : 9;
  if (offset + size > u8.length) throw new RangeError('decodeVarInt: truncated varint');

  const view = new DataView(u8.buffer, u8.byteOffset + offset + 1, size - 1);
  if (fb === 0xfd) return { value: view.getUint16(0, true), length: 3 };
  if (fb === 0xfe) return { value: view.getUint32(0, true), length: 5 };

  const big = view.getBigUint64(0, true);
  if (big > BigInt(Number.MAX_SAFE_INTEGER)) throw new RangeError('decodeVarInt: value exceeds safe integer range');
  return { value: Number(big), length: 9 };
}
