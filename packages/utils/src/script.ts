// packages/utils/src/script.ts
import { concat, readU32LE } from './bytes.js';

export const OP_RETURN = 0x6a;
export const OP_1 = 0x51;
export const OP_PUSHDATA1 = 0x4c;
export const OP_PUSHDATA2 = 0x4d;
export const OP_PUSHDATA4 = 0x4e;

export function pushDataPrefix(len: number): Uint8Array {
  if (!Number.isInteger(len) || len < 0) throw new Error('pushDataPrefix: len must be a non-negative integer');

  if (len < OP_PUSHDATA1) {
    return new Uint8Array([len]);
  } else if (len <= 0xff) {
    return new Uint8Array([OP_PUSHDATA1, len]);
  } else if (len <= 0xffff) {
    return new Uint8Array([OP_PUSHDATA2, len & 0xff, (len >> 8) & 0xff]);
  } else if (len <= 0xffffffff) {
    return new Uint8Array([OP_PUSHDATA4, len & 0xff, (len >> 8) & 0xff, (len >> 16) & 0xff, (len >>> 24) & 0xff]);
  } else {
    throw new Error('Push data too large');
  }
}

export function pushData(data: Uint8Array): Uint8Array {
  return concat(pushDataPrefix(data.length), data);
}

export type PushHeader = {
  /** bytes taken by the opcode and any length bytes */
  prefixLength: number;
  /** declared data length */
  dataLength: number;
};

/**
 * Read a data-push header at `pos`. Returns null when the opcode there is not a
 * push (OP_0 counts as a zero-length push) or the length bytes are cut off.
 */
export function readPushHeader(script: Uint8Array, pos: number): PushHeader | null {
  if (pos >= script.length) return null;
  const op = script[pos];

  if (op < OP_PUSHDATA1) return { prefixLength: 1, dataLength: op };

  if (op === OP_PUSHDATA1) {
    if (pos + 2 > script.length) return null;
    return { prefixLength: 2, dataLength: script[pos + 1] };
  }

  if (op === OP_PUSHDATA2) {
    if (pos + 3 > script.length) return null;
    return { prefixLength: 3, dataLength: script[pos + 1] | (script[pos + 2] << 8) };
  }

  if (op === OP_PUSHDATA4) {
    if (pos + 5 > script.length) return null;
    return { prefixLength: 5, dataLength: readU32LE(script, pos + 1) };
  }

  return null;
}

/** Segwit v1 output: OP_1 PUSH32 <x-only key>. */
export function isTaprootScript(script: Uint8Array): boolean {
  return script.length === 34 && script[0] === OP_1 && script[1] === 0x20;
}

export function taprootScript(outputKey: Uint8Array): Uint8Array {
  if (outputKey.length !== 32) throw new Error('taprootScript: output key must be 32 bytes');
  return concat(new Uint8Array([OP_1, 0x20]), outputKey);
}
