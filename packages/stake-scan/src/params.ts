// packages/stake-scan/src/params.ts

import type { RejectionReason } from './types.js';

export type StakingParamsVersion = {
  readonly version: number;
  readonly activationHeight: number;
  /** last height (inclusive) at which new stakes are accepted under this version */
  readonly capHeight?: number;
  readonly minStakingAmount: bigint;
  readonly maxStakingAmount: bigint;
  readonly minStakingTime: number;
  readonly maxStakingTime: number;
  /** payload tag (hex) this version expects; any tag when absent */
  readonly tag?: string;
};

export type StakingParams = {
  readonly versions: readonly StakingParamsVersion[];
};

export class StakingParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StakingParamsError';
  }
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function readInt(obj: Record<string, unknown>, key: string, path: string): number {
  const v = obj[key];
  if (typeof v !== 'number' || !Number.isSafeInteger(v) || v < 0) {
    throw new StakingParamsError(`${path}.${key} must be a non-negative integer`);
  }
  return v;
}

function readTag(v: unknown, path: string): string {
  if (typeof v !== 'string' || !/^[0-9a-fA-F]{8}$/.test(v)) {
    throw new StakingParamsError(`${path}.tag must be 4 bytes of hex`);
  }
  return v.toLowerCase();
}

function parseVersion(x: unknown, path: string): StakingParamsVersion {
  if (!isRecord(x)) throw new StakingParamsError(`${path} must be an object`);

  const version = readInt(x, 'version', path);
  const activationHeight = readInt(x, 'activation_height', path);
  const capHeight = x.cap_height === undefined ? undefined : readInt(x, 'cap_height', path);
  const minStakingAmount = readInt(x, 'min_staking_amount', path);
  const maxStakingAmount = readInt(x, 'max_staking_amount', path);
  const minStakingTime = readInt(x, 'min_staking_time', path);
  const maxStakingTime = readInt(x, 'max_staking_time', path);

  if (minStakingAmount > maxStakingAmount) {
    throw new StakingParamsError(`${path}: min_staking_amount exceeds max_staking_amount`);
  }
  if (minStakingTime > maxStakingTime) {
    throw new StakingParamsError(`${path}: min_staking_time exceeds max_staking_time`);
  }
  const tag = x.tag === undefined ? undefined : readTag(x.tag, path);
  if (capHeight !== undefined && capHeight < activationHeight) {
    throw new StakingParamsError(`${path}: cap_height is below activation_height`);
  }

  return Object.freeze({
    version,
    activationHeight,
    ...(capHeight === undefined ? {} : { capHeight }),
    minStakingAmount: BigInt(minStakingAmount),
    maxStakingAmount: BigInt(maxStakingAmount),
    minStakingTime,
    maxStakingTime,
    ...(tag === undefined ? {} : { tag }),
  });
}

/**
 * Validate a parsed global-params document:
 * `{ "versions": [ { version, activation_height, cap_height?, min/max_staking_amount, min/max_staking_time, tag? } ] }`.
 * Unknown fields are ignored.
 */
export function parseStakingParams(doc: unknown): StakingParams {
  if (!isRecord(doc)) throw new StakingParamsError('params: document must be an object');
  const versions = doc.versions;
  if (!Array.isArray(versions) || versions.length === 0) {
    throw new StakingParamsError('params.versions must be a non-empty array');
  }
  return Object.freeze({
    versions: Object.freeze(versions.map((v: unknown, i) => parseVersion(v, `params.versions[${i}]`))),
  });
}

/** Entry for this payload version that is active at `height`, or null. */
export function selectParams(params: StakingParams, height: number, version: number): StakingParamsVersion | null {
  for (const p of params.versions) {
    if (p.version !== version || p.activationHeight > height) continue;
    if (p.capHeight !== undefined && height > p.capHeight) continue;
    return p;
  }
  return null;
}

export function checkStakeAgainstParams(
  params: StakingParams,
  stake: { blockHeight: number; version: number; tag: string; stakedSats: bigint; stakingTime: number }
): RejectionReason | null {
  const p = selectParams(params, stake.blockHeight, stake.version);
  if (!p) return 'no-params';
  if (p.tag !== undefined && p.tag !== stake.tag) return 'bad-magic';
  if (stake.stakedSats < p.minStakingAmount || stake.stakedSats > p.maxStakingAmount) return 'amount-out-of-range';
  if (stake.stakingTime < p.minStakingTime || stake.stakingTime > p.maxStakingTime) return 'time-out-of-range';
  return null;
}
