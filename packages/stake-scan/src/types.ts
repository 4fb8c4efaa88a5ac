// packages/stake-scan/src/types.ts

import type { Hex, NodeClientErrorKind } from '@bbn-scan/node-client';

export type ScanWindow = {
  readonly startHeight: number;
  /** inclusive */
  readonly endHeight: number;
};

export type OpReturnPayload = {
  outputIndex: number;
  bytes: Uint8Array;
};

export type OutputClass = { kind: 'not-op-return' } | { kind: 'op-return'; payload: Uint8Array };

/** Fields carried in the OP_RETURN payload, in wire order. */
export type StakePayload = {
  tag: Uint8Array;
  version: number;
  stakerPk: Uint8Array;
  finalityProviderPk: Uint8Array;
  stakingTime: number;
};

export type StakeRecord = {
  readonly txid: Hex;
  readonly blockHeight: number;
  readonly blockTime: number;
  readonly tag: Hex;
  readonly version: number;
  readonly stakerKey: Hex;
  readonly finalityProviderKey: Hex;
  readonly stakingTime: number;
  readonly stakedSats: bigint;
  readonly stakingOutputIndex: number;
  readonly opReturnOutputIndex: number;
};

export const REJECTION_REASONS = [
  'too-short',
  'bad-magic',
  'unsupported-version',
  'too-long',
  'malformed-key',
  'missing-staking-output',
  'no-params',
  'amount-out-of-range',
  'time-out-of-range',
] as const;

export type RejectionReason = (typeof REJECTION_REASONS)[number];

export type Decoded<T> = { ok: true; value: T } | { ok: false; reason: RejectionReason };

export type TxClassification =
  | { kind: 'no-payload' }
  | { kind: 'stake'; record: StakeRecord }
  | { kind: 'rejected'; reason: RejectionReason; opReturnOutputIndex: number };

export type BlockScanResult = {
  height: number;
  transactions: number;
  opReturnPayloads: number;
  stakes: StakeRecord[];
  rejections: RejectionReason[];
};

export type SkipCause = NodeClientErrorKind;

export type SkippedBlock = {
  readonly height: number;
  readonly cause: SkipCause;
};

export type FinalityProviderStats = {
  readonly finalityProviderKey: Hex;
  readonly stakeCount: number;
  readonly totalStakedSats: bigint;
  readonly stakers: ReadonlySet<Hex>;
  readonly versions: readonly number[];
  readonly blockHeights: readonly number[];
  readonly firstBlockTime: number;
  readonly lastBlockTime: number;
};

export type VersionStats = {
  readonly version: number;
  readonly stakeCount: number;
  readonly totalStakedSats: bigint;
  readonly stakers: ReadonlySet<Hex>;
  readonly finalityProviders: ReadonlySet<Hex>;
};

export type ScanReport = {
  readonly window: ScanWindow;
  readonly blocksScanned: number;
  readonly blocksSkipped: number;
  readonly skippedBlocks: readonly SkippedBlock[];
  readonly transactionsExamined: number;
  readonly opReturnPayloads: number;
  readonly stakesFound: number;
  readonly rejected: number;
  readonly rejectionsByReason: Readonly<Record<RejectionReason, number>>;
  readonly totalStakedSats: bigint;
  readonly distinctStakers: number;
  /** ordered by finality provider key */
  readonly finalityProviders: ReadonlyMap<Hex, FinalityProviderStats>;
  /** ordered by version */
  readonly versions: ReadonlyMap<number, VersionStats>;
  /** ordered by block height, then txid */
  readonly stakes: readonly StakeRecord[];
};
