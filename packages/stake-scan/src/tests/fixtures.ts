// packages/stake-scan/src/tests/fixtures.ts
//
// Keys, payloads and an in-memory node used across the scanner tests.

import { secp256k1 } from '@noble/curves/secp256k1.js';
import { concat, hexToBytes, pushData, taprootScript, OP_RETURN } from '@bbn-scan/utils';
import {
  NodeClientError,
  type Block,
  type NodeClient,
  type RawTransaction,
  type RequestOptions,
} from '@bbn-scan/node-client';

import { encodeStakePayload, DEFAULT_TAG_HEX } from '../stakePayload.js';

export function xOnlyKey(privHex: string): Uint8Array {
  return secp256k1.getPublicKey(hexToBytes(privHex), true).slice(1);
}

export const STAKER_A = xOnlyKey('11'.repeat(32));
export const STAKER_B = xOnlyKey('22'.repeat(32));
export const FP_1 = xOnlyKey('33'.repeat(32));
export const FP_2 = xOnlyKey('44'.repeat(32));

export const TAPROOT_OUT = taprootScript(new Uint8Array(32).fill(0x55));
export const P2WPKH_OUT = concat(Uint8Array.from([0x00, 0x14]), new Uint8Array(20).fill(0x66));

export function stakePayload(args: {
  staker?: Uint8Array;
  fp?: Uint8Array;
  version?: number;
  stakingTime?: number;
  tagHex?: string;
} = {}): Uint8Array {
  return encodeStakePayload({
    tag: hexToBytes(args.tagHex ?? DEFAULT_TAG_HEX),
    version: args.version ?? 0,
    stakerPk: args.staker ?? STAKER_A,
    finalityProviderPk: args.fp ?? FP_1,
    stakingTime: args.stakingTime ?? 64000,
  });
}

export function opReturn(payload: Uint8Array): Uint8Array {
  return concat(Uint8Array.from([OP_RETURN]), pushData(payload));
}

export function stakeTx(txid: string, payload: Uint8Array, stakedSats: bigint, stakingScript = TAPROOT_OUT): RawTransaction {
  return {
    txid,
    outputs: [
      { index: 0, valueSats: stakedSats, script: stakingScript },
      { index: 1, valueSats: 0n, script: opReturn(payload) },
      { index: 2, valueSats: 12_345n, script: P2WPKH_OUT },
    ],
  };
}

export function plainTx(txid: string): RawTransaction {
  return { txid, outputs: [{ index: 0, valueSats: 50_000n, script: P2WPKH_OUT }] };
}

export function txid(n: number): string {
  return n.toString(16).padStart(64, '0');
}

export function block(height: number, transactions: RawTransaction[], time = 1_700_000_000 + height * 600): Block {
  return { height, hash: txid(0xb000 + height), time, transactions };
}

/**
 * Scripted per-height failures; each entry is consumed by one fetch, 'always' never is.
 * Errors other than NodeClientError stand for defects.
 */
export type FailurePlan = Error[] | 'always';

export class FakeNodeClient implements NodeClient {
  readonly blockCalls = new Map<number, number>();
  /** hanging fetches released by their signal */
  readonly abortedHeights: number[] = [];
  tipCalls = 0;

  constructor(
    private readonly tip: number | NodeClientError,
    private readonly blocks: Map<number, Block>,
    private readonly failures = new Map<number, FailurePlan>(),
    /** heights whose fetch never answers; only the request signal ends it */
    private readonly hangs = new Set<number>()
  ) {}

  async getBlockCount(): Promise<number> {
    this.tipCalls += 1;
    if (this.tip instanceof NodeClientError) throw this.tip;
    return this.tip;
  }

  async getBlockByHeight(height: number, opts: RequestOptions = {}): Promise<Block> {
    this.blockCalls.set(height, (this.blockCalls.get(height) ?? 0) + 1);
    if (this.hangs.has(height)) return this.hang(height, opts.signal);

    const plan = this.failures.get(height);
    if (plan === 'always') throw new NodeClientError('unavailable', 'getblock', 'connect ECONNREFUSED');
    const next = plan?.shift();
    if (next) throw next;

    const b = this.blocks.get(height);
    if (!b) throw new NodeClientError('not-found', 'getblockhash', 'Block height out of range');
    // yield so workers interleave
    await Promise.resolve();
    return b;
  }

  private hang(height: number, signal?: AbortSignal): Promise<Block> {
    return new Promise((_resolve, reject) => {
      const release = () => {
        this.abortedHeights.push(height);
        reject(new NodeClientError('aborted', 'getblock', 'request cancelled'));
      };
      if (signal?.aborted) release();
      else signal?.addEventListener('abort', release, { once: true });
    });
  }

  async getRawTransaction(id: string): Promise<RawTransaction> {
    for (const b of this.blocks.values()) {
      const tx = b.transactions.find((t) => t.txid === id);
      if (tx) return tx;
    }
    throw new NodeClientError('not-found', 'getrawtransaction', 'No such mempool or blockchain transaction');
  }
}

export function chainOf(blocks: Block[]): Map<number, Block> {
  return new Map(blocks.map((b) => [b.height, b]));
}

export const noSleep = async (): Promise<void> => {};
