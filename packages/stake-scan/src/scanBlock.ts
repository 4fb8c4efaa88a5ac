// packages/stake-scan/src/scanBlock.ts

import type { Block } from '@bbn-scan/node-client';

import { decodeStakeTransaction, type TxDecodeContext } from './stakeTx.js';
import type { BlockScanResult } from './types.js';

export function scanBlock(block: Block, ctx: TxDecodeContext = {}): BlockScanResult {
  const out: BlockScanResult = {
    height: block.height,
    transactions: block.transactions.length,
    opReturnPayloads: 0,
    stakes: [],
    rejections: [],
  };

  for (const tx of block.transactions) {
    const cls = decodeStakeTransaction(tx, block, ctx);
    if (cls.kind === 'no-payload') continue;

    out.opReturnPayloads += 1;
    if (cls.kind === 'stake') out.stakes.push(cls.record);
    else out.rejections.push(cls.reason);
  }

  return out;
}
