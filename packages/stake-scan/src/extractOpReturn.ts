// packages/stake-scan/src/extractOpReturn.ts

import { OP_RETURN, readPushHeader } from '@bbn-scan/utils';
import type { RawTransaction } from '@bbn-scan/node-client';

import type { OpReturnPayload, OutputClass } from './types.js';

const NOT_OP_RETURN: OutputClass = Object.freeze({ kind: 'not-op-return' });

/**
 * OP_RETURN outputs yield the bytes after the opcode and its push prefix.
 * A push that claims more bytes than the script holds yields what is there;
 * a non-push after OP_RETURN yields everything after the opcode.
 */
export function classifyOutput(script: Uint8Array): OutputClass {
  if (script.length === 0 || script[0] !== OP_RETURN) return NOT_OP_RETURN;

  const push = readPushHeader(script, 1);
  if (!push) return { kind: 'op-return', payload: script.slice(1) };

  const start = 1 + push.prefixLength;
  const end = Math.min(script.length, start + push.dataLength);
  return { kind: 'op-return', payload: script.slice(start, end) };
}

/** First OP_RETURN output of the transaction; later ones are ignored. */
export function findOpReturnPayload(tx: RawTransaction): OpReturnPayload | null {
  for (const out of tx.outputs) {
    const cls = classifyOutput(out.script);
    if (cls.kind === 'op-return') return { outputIndex: out.index, bytes: cls.payload };
  }
  return null;
}
