// packages/stake-scan/src/stakeTx.ts

import { bytesToHex, isTaprootScript } from '@bbn-scan/utils';
import type { RawTransaction } from '@bbn-scan/node-client';

import { findOpReturnPayload } from './extractOpReturn.js';
import { checkStakeAgainstParams, type StakingParams } from './params.js';
import { decodeStakePayload, DEFAULT_DECODE_OPTIONS, type StakeDecodeOptions } from './stakePayload.js';
import type { RejectionReason, StakeRecord, TxClassification } from './types.js';

export const STAKING_OUTPUT_INDEX = 0;

export type TxDecodeContext = {
  decode?: StakeDecodeOptions;
  params?: StakingParams | null;
};

export type BlockRef = {
  height: number;
  time: number;
};

/**
 * Classify one transaction: no OP_RETURN at all, a stake, or a rejected payload.
 * The staking output is always output 0 and must pay to a Taproot key.
 */
export function decodeStakeTransaction(
  tx: RawTransaction,
  block: BlockRef,
  ctx: TxDecodeContext = {}
): TxClassification {
  const payload = findOpReturnPayload(tx);
  if (!payload) return { kind: 'no-payload' };

  const reject = (reason: RejectionReason): TxClassification => ({
    kind: 'rejected',
    reason,
    opReturnOutputIndex: payload.outputIndex,
  });

  const decoded = decodeStakePayload(payload.bytes, ctx.decode ?? DEFAULT_DECODE_OPTIONS);
  if (!decoded.ok) return reject(decoded.reason);

  const stakingOutput = tx.outputs.find((o) => o.index === STAKING_OUTPUT_INDEX);
  if (!stakingOutput || !isTaprootScript(stakingOutput.script)) return reject('missing-staking-output');

  const fields = decoded.value;
  const record: StakeRecord = Object.freeze({
    txid: tx.txid,
    blockHeight: block.height,
    blockTime: block.time,
    tag: bytesToHex(fields.tag),
    version: fields.version,
    stakerKey: bytesToHex(fields.stakerPk),
    finalityProviderKey: bytesToHex(fields.finalityProviderPk),
    stakingTime: fields.stakingTime,
    stakedSats: stakingOutput.valueSats,
    stakingOutputIndex: stakingOutput.index,
    opReturnOutputIndex: payload.outputIndex,
  });

  if (ctx.params) {
    const reason = checkStakeAgainstParams(ctx.params, record);
    if (reason) return reject(reason);
  }

  return { kind: 'stake', record };
}

