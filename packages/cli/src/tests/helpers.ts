// packages/cli/src/tests/helpers.ts

import { secp256k1 } from '@noble/curves/secp256k1.js';
import { concat, hexToBytes, pushData, taprootScript } from '@bbn-scan/utils';
import { NodeClientError, type Block, type NodeClient, type RawTransaction } from '@bbn-scan/node-client';
import { encodeStakePayload } from '@bbn-scan/stake-scan';

import type { Output } from '../output.js';

export const RPC_ENV = {
  BTC_RPC_URL: 'http://127.0.0.1:18443',
  BTC_RPC_USER: 'test-user',
  BTC_RPC_PASSWORD: 'test-secret',
};

export function xOnlyKey(privHex: string): Uint8Array {
  return secp256k1.getPublicKey(hexToBytes(privHex), true).slice(1);
}

export const STAKER = xOnlyKey('11'.repeat(32));
export const FP = xOnlyKey('33'.repeat(32));

export function txid(n: number): string {
  return n.toString(16).padStart(64, '0');
}

export function stakeTx(id: string, stakedSats: bigint, opts: { stakingTime?: number; truncate?: number } = {}): RawTransaction {
  const payload = encodeStakePayload({
    tag: hexToBytes('62626e31'),
    version: 0,
    stakerPk: STAKER,
    finalityProviderPk: FP,
    stakingTime: opts.stakingTime ?? 64_000,
  });
  const body = opts.truncate === undefined ? payload : payload.slice(0, opts.truncate);
  return {
    txid: id,
    outputs: [
      { index: 0, valueSats: stakedSats, script: taprootScript(new Uint8Array(32).fill(0x55)) },
      { index: 1, valueSats: 0n, script: concat(Uint8Array.from([0x6a]), pushData(body)) },
    ],
  };
}

export function plainTx(id: string): RawTransaction {
  return {
    txid: id,
    outputs: [{ index: 0, valueSats: 10_000n, script: concat(Uint8Array.from([0x00, 0x14]), new Uint8Array(20)) }],
  };
}

export class FakeNodeClient implements NodeClient {
  constructor(
    private readonly tip: number,
    private readonly blocks: Block[]
  ) {}

  async getBlockCount(): Promise<number> {
    return this.tip;
  }

  async getBlockByHeight(height: number): Promise<Block> {
    const b = this.blocks.find((x) => x.height === height);
    if (!b) throw new NodeClientError('not-found', 'getblockhash', 'Block height out of range');
    return b;
  }

  async getRawTransaction(id: string): Promise<RawTransaction> {
    for (const b of this.blocks) {
      const tx = b.transactions.find((t) => t.txid === id);
      if (tx) return tx;
    }
    throw new NodeClientError('not-found', 'getrawtransaction', 'No such mempool or blockchain transaction');
  }
}

export function block(height: number, transactions: RawTransaction[]): Block {
  return { height, hash: txid(0xb000 + height), time: 1_700_000_000 + height, transactions };
}

export function captureOutput(): Output & { stdout: string[]; stderr: string[]; status: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const status: string[] = [];
  return {
    stdout,
    stderr,
    status,
    print: (line) => stdout.push(line),
    note: (line) => stderr.push(line),
    progress: (text) => status.push(text),
  };
}
