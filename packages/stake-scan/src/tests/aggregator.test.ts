// packages/stake-scan/src/tests/aggregator.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { bytesToHex } from '@bbn-scan/utils';

import { AggregatorClosedError, StakeAggregator } from '../aggregator.js';
import type { BlockScanResult, StakeRecord } from '../types.js';
import { FP_1, FP_2, STAKER_A, STAKER_B, txid } from './fixtures.js';

const window = { startHeight: 10, endHeight: 13 };

function record(n: number, height: number, staker: Uint8Array, fp: Uint8Array, sats: bigint, version = 0): StakeRecord {
  return {
    txid: txid(n),
    blockHeight: height,
    blockTime: 1000 + height,
    tag: '62626e31',
    version,
    stakerKey: bytesToHex(staker),
    finalityProviderKey: bytesToHex(fp),
    stakingTime: 64_000,
    stakedSats: sats,
    stakingOutputIndex: 0,
    opReturnOutputIndex: 1,
  };
}

const results: BlockScanResult[] = [
  {
    height: 10,
    transactions: 3,
    opReturnPayloads: 2,
    stakes: [record(2, 10, STAKER_A, FP_1, 100n), record(1, 10, STAKER_B, FP_1, 50n)],
    rejections: [],
  },
  { height: 11, transactions: 1, opReturnPayloads: 1, stakes: [], rejections: ['bad-magic'] },
  {
    height: 13,
    transactions: 2,
    opReturnPayloads: 2,
    stakes: [record(3, 13, STAKER_A, FP_2, 7n, 1)],
    rejections: ['too-short'],
  },
];

function aggregate(order: number[], skippedFirst: boolean) {
  const agg = new StakeAggregator(window);
  if (skippedFirst) agg.recordSkippedBlock(12, 'unavailable');
  for (const i of order) agg.ingestBlock(results[i]);
  if (!skippedFirst) agg.recordSkippedBlock(12, 'unavailable');
  return agg.snapshot();
}

test('totals and breakdowns', () => {
  const r = aggregate([0, 1, 2], true);
  const fp1 = r.finalityProviders.get(bytesToHex(FP_1));

  assert.equal(r.blocksScanned, 3);
  assert.equal(r.blocksSkipped, 1);
  assert.deepEqual(r.skippedBlocks, [{ height: 12, cause: 'unavailable' }]);
  assert.equal(r.transactionsExamined, 6);
  assert.equal(r.opReturnPayloads, 5);
  assert.equal(r.stakesFound, 3);
  assert.equal(r.rejected, 2);
  assert.equal(r.rejectionsByReason['bad-magic'], 1);
  assert.equal(r.rejectionsByReason['too-short'], 1);
  assert.equal(r.rejectionsByReason['malformed-key'], 0);
  assert.equal(r.totalStakedSats, 157n);
  assert.equal(r.distinctStakers, 2);

  assert.ok(fp1);
  assert.equal(fp1.stakeCount, 2);
  assert.equal(fp1.totalStakedSats, 150n);
  assert.equal(fp1.stakers.size, 2);
  assert.deepEqual(fp1.blockHeights, [10]);
  assert.equal(fp1.firstBlockTime, 1010);

  assert.deepEqual([...r.versions.keys()], [0, 1]);
  assert.equal(r.versions.get(0)?.finalityProviders.size, 1);
  assert.equal(r.versions.get(1)?.totalStakedSats, 7n);

  assert.deepEqual(
    r.stakes.map((s) => s.txid),
    [txid(1), txid(2), txid(3)]
  );
});

test('ingestion order does not change the snapshot', () => {
  const a = aggregate([0, 1, 2], true);
  const b = aggregate([2, 1, 0], false);

  assert.deepEqual(b, a);
  assert.deepEqual([...b.finalityProviders.keys()], [...a.finalityProviders.keys()]);
  assert.deepEqual([...b.finalityProviders.keys()], [bytesToHex(FP_1), bytesToHex(FP_2)].sort());
  assert.deepEqual(
    b.stakes.map((s) => s.txid),
    a.stakes.map((s) => s.txid)
  );
});

test('a block is reported once', () => {
  const agg = new StakeAggregator(window);
  agg.ingestBlock(results[1]);

  assert.throws(() => agg.ingestBlock(results[1]), /reported twice/);
  assert.throws(() => agg.recordSkippedBlock(11, 'not-found'), /reported twice/);
});

test('the snapshot is terminal', () => {
  const agg = new StakeAggregator(window);
  agg.snapshot();

  assert.throws(() => agg.ingestBlock(results[0]), AggregatorClosedError);
  assert.throws(() => agg.recordRejection('too-long'), AggregatorClosedError);
  assert.throws(() => agg.snapshot(), AggregatorClosedError);
});
