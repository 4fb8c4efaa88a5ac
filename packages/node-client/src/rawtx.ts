// packages/node-client/src/rawtx.ts
//
// Minimal consensus-format parser: enough to recover txids and outputs
// (value + scriptPubKey) from raw block and transaction bytes. Inputs and
// witnesses are skipped, not decoded.

import { concat, decodeVarInt, displayHashHex, hexToBytes, readU32LE, readU64LE } from '@bbn-scan/utils';

import type { RawTransaction, TxOutput } from './types.js';

const BLOCK_HEADER_SIZE = 80;
const HEADER_TIME_OFFSET = 68;

class Cursor {
  constructor(
    readonly bytes: Uint8Array,
    public pos: number
  ) {}

  need(n: number, what: string): void {
    if (this.pos + n > this.bytes.length) {
      throw new RangeError(`rawtx: truncated ${what} at offset ${this.pos}`);
    }
  }

  skip(n: number, what: string): void {
    this.need(n, what);
    this.pos += n;
  }

  take(n: number, what: string): Uint8Array {
    this.need(n, what);
    const out = this.bytes.slice(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  varint(what: string): number {
    this.need(1, what);
    const v = decodeVarInt(this.bytes, this.pos);
    this.pos += v.length;
    return v.value;
  }
}

/**
 * Parse one transaction starting at `offset`. Handles the segwit marker/flag;
 * the txid is computed over the witness-stripped serialization.
 */
export function readTransaction(bytes: Uint8Array, offset = 0): { tx: RawTransaction; end: number } {
  const c = new Cursor(bytes, offset);

  c.skip(4, 'version');

  let segwit = false;
  if (c.pos + 1 < bytes.length && bytes[c.pos] === 0x00 && bytes[c.pos + 1] === 0x01) {
    segwit = true;
    c.pos += 2;
  }

  const bodyStart = c.pos;

  const inCount = c.varint('input count');
  for (let i = 0; i < inCount; i++) {
    c.skip(36, 'outpoint');
    c.skip(c.varint('scriptSig length'), 'scriptSig');
    c.skip(4, 'sequence');
  }

  const outCount = c.varint('output count');
  const outputs: TxOutput[] = [];
  for (let index = 0; index < outCount; index++) {
    c.need(8, 'output value');
    const valueSats = readU64LE(bytes, c.pos);
    c.pos += 8;

    const script = c.take(c.varint('scriptPubKey length'), 'scriptPubKey');
    outputs.push({ index, valueSats, script });
  }

  const bodyEnd = c.pos;

  if (segwit) {
    for (let i = 0; i < inCount; i++) {
      const items = c.varint('witness item count');
      for (let j = 0; j < items; j++) c.skip(c.varint('witness item length'), 'witness item');
    }
  }

  c.need(4, 'locktime');
  const locktimeStart = c.pos;
  c.pos += 4;

  const stripped = concat(
    bytes.subarray(offset, offset + 4),
    bytes.subarray(bodyStart, bodyEnd),
    bytes.subarray(locktimeStart, locktimeStart + 4)
  );

  return { tx: { txid: displayHashHex(stripped), outputs }, end: c.pos };
}

export function parseRawTransactionHex(rawTxHex: string): RawTransaction {
  const bytes = hexToBytes(rawTxHex);
  const { tx, end } = readTransaction(bytes, 0);
  if (end !== bytes.length) throw new RangeError(`rawtx: ${bytes.length - end} trailing bytes after transaction`);
  return tx;
}

export type ParsedBlock = {
  hash: string;
  time: number;
  transactions: RawTransaction[];
};

export function parseRawBlockHex(rawBlockHex: string): ParsedBlock {
  const bytes = hexToBytes(rawBlockHex);
  if (bytes.length < BLOCK_HEADER_SIZE) throw new RangeError('rawtx: block shorter than its header');

  const header = bytes.subarray(0, BLOCK_HEADER_SIZE);
  const hash = displayHashHex(header);
  const time = readU32LE(bytes, HEADER_TIME_OFFSET);

  const count = decodeVarInt(bytes, BLOCK_HEADER_SIZE);
  let pos = BLOCK_HEADER_SIZE + count.length;

  const transactions: RawTransaction[] = [];
  for (let i = 0; i < count.value; i++) {
    const { tx, end } = readTransaction(bytes, pos);
    transactions.push(tx);
    pos = end;
  }

  if (pos !== bytes.length) throw new RangeError(`rawtx: ${bytes.length - pos} trailing bytes after block`);

  return { hash, time, transactions };
}
