// packages/stake-scan/src/aggregator.ts

import type { Hex } from '@bbn-scan/node-client';

import type {
  BlockScanResult,
  FinalityProviderStats,
  RejectionReason,
  ScanReport,
  ScanWindow,
  SkipCause,
  SkippedBlock,
  StakeRecord,
  VersionStats,
} from './types.js';

type ProviderAcc = {
  stakeCount: number;
  totalStakedSats: bigint;
  stakers: Set<Hex>;
  versions: Set<number>;
  blockHeights: Set<number>;
  firstBlockTime: number;
  lastBlockTime: number;
};

type VersionAcc = {
  stakeCount: number;
  totalStakedSats: bigint;
  stakers: Set<Hex>;
  finalityProviders: Set<Hex>;
};

export class AggregatorClosedError extends Error {
  constructor() {
    super('aggregator: snapshot already taken');
    this.name = 'AggregatorClosedError';
  }
}

function emptyRejectionCounts(): Record<RejectionReason, number> {
  return {
    'too-short': 0,
    'bad-magic': 0,
    'unsupported-version': 0,
    'too-long': 0,
    'malformed-key': 0,
    'missing-staking-output': 0,
    'no-params': 0,
    'amount-out-of-range': 0,
    'time-out-of-range': 0,
  };
}

function compareStakes(a: StakeRecord, b: StakeRecord): number {
  if (a.blockHeight !== b.blockHeight) return a.blockHeight - b.blockHeight;
  return a.txid < b.txid ? -1 : a.txid > b.txid ? 1 : 0;
}

function byKey<K extends string | number>(a: [K, unknown], b: [K, unknown]): number {
  return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

/**
 * Accumulates per-block results into a run report. Every update is commutative,
 * so blocks may arrive in any order; `snapshot()` sorts what it returns.
 * The snapshot is terminal.
 */
export class StakeAggregator {
  private readonly providers = new Map<Hex, ProviderAcc>();
  private readonly versions = new Map<number, VersionAcc>();
  private readonly stakers = new Set<Hex>();
  private readonly stakes = new Map<Hex, StakeRecord>();
  private readonly rejections = emptyRejectionCounts();
  private readonly skipped = new Map<number, SkipCause>();
  private readonly scannedHeights = new Set<number>();

  private transactionsExamined = 0;
  private opReturnPayloads = 0;
  private rejected = 0;
  private totalStakedSats = 0n;
  private closed = false;

  constructor(readonly window: ScanWindow) {}

  ingestBlock(result: BlockScanResult): void {
    this.assertOpen();
    if (this.scannedHeights.has(result.height) || this.skipped.has(result.height)) {
      throw new Error(`aggregator: block ${result.height} reported twice`);
    }
    this.scannedHeights.add(result.height);
    this.transactionsExamined += result.transactions;
    this.opReturnPayloads += result.opReturnPayloads;
    for (const record of result.stakes) this.ingest(record);
    for (const reason of result.rejections) this.recordRejection(reason);
  }

  ingest(record: StakeRecord): void {
    this.assertOpen();
    if (this.stakes.has(record.txid)) throw new Error(`aggregator: stake ${record.txid} ingested twice`);
    this.stakes.set(record.txid, record);

    this.totalStakedSats += record.stakedSats;
    this.stakers.add(record.stakerKey);

    let fp = this.providers.get(record.finalityProviderKey);
    if (!fp) {
      fp = {
        stakeCount: 0,
        totalStakedSats: 0n,
        stakers: new Set(),
        versions: new Set(),
        blockHeights: new Set(),
        firstBlockTime: record.blockTime,
        lastBlockTime: record.blockTime,
      };
      this.providers.set(record.finalityProviderKey, fp);
    }
    fp.stakeCount += 1;
    fp.totalStakedSats += record.stakedSats;
    fp.stakers.add(record.stakerKey);
    fp.versions.add(record.version);
    fp.blockHeights.add(record.blockHeight);
    fp.firstBlockTime = Math.min(fp.firstBlockTime, record.blockTime);
    fp.lastBlockTime = Math.max(fp.lastBlockTime, record.blockTime);

    let v = this.versions.get(record.version);
    if (!v) {
      v = { stakeCount: 0, totalStakedSats: 0n, stakers: new Set(), finalityProviders: new Set() };
      this.versions.set(record.version, v);
    }
    v.stakeCount += 1;
    v.totalStakedSats += record.stakedSats;
    v.stakers.add(record.stakerKey);
    v.finalityProviders.add(record.finalityProviderKey);
  }

  recordRejection(reason: RejectionReason): void {
    this.assertOpen();
    this.rejections[reason] += 1;
    this.rejected += 1;
  }

  recordSkippedBlock(height: number, cause: SkipCause): void {
    this.assertOpen();
    if (this.scannedHeights.has(height) || this.skipped.has(height)) {
      throw new Error(`aggregator: block ${height} reported twice`);
    }
    this.skipped.set(height, cause);
  }

  snapshot(): ScanReport {
    this.assertOpen();
    this.closed = true;

    const finalityProviders = new Map<Hex, FinalityProviderStats>();
    for (const [key, fp] of [...this.providers].sort(byKey)) {
      finalityProviders.set(
        key,
        Object.freeze({
          finalityProviderKey: key,
          stakeCount: fp.stakeCount,
          totalStakedSats: fp.totalStakedSats,
          stakers: new Set([...fp.stakers].sort()),
          versions: [...fp.versions].sort((a, b) => a - b),
          blockHeights: [...fp.blockHeights].sort((a, b) => a - b),
          firstBlockTime: fp.firstBlockTime,
          lastBlockTime: fp.lastBlockTime,
        })
      );
    }

    const versions = new Map<number, VersionStats>();
    for (const [version, v] of [...this.versions].sort(byKey)) {
      versions.set(
        version,
        Object.freeze({
          version,
          stakeCount: v.stakeCount,
          totalStakedSats: v.totalStakedSats,
          stakers: new Set([...v.stakers].sort()),
          finalityProviders: new Set([...v.finalityProviders].sort()),
        })
      );
    }

    const skippedBlocks: SkippedBlock[] = [...this.skipped]
      .sort(byKey)
      .map(([height, cause]) => Object.freeze({ height, cause }));

    return Object.freeze({
      window: this.window,
      blocksScanned: this.scannedHeights.size,
      blocksSkipped: skippedBlocks.length,
      skippedBlocks: Object.freeze(skippedBlocks),
      transactionsExamined: this.transactionsExamined,
      opReturnPayloads: this.opReturnPayloads,
      stakesFound: this.stakes.size,
      rejected: this.rejected,
      rejectionsByReason: Object.freeze({ ...this.rejections }),
      totalStakedSats: this.totalStakedSats,
      distinctStakers: this.stakers.size,
      finalityProviders,
      versions,
      stakes: Object.freeze([...this.stakes.values()].sort(compareStakes)),
    });
  }

  private assertOpen(): void {
    if (this.closed) throw new AggregatorClosedError();
  }
}
