// packages/stake-scan/src/stakePayload.ts

import { secp256k1 } from '@noble/curves/secp256k1.js';
import { arraysEqual, bytesToHex, concat, hexToBytes, isAllZero, readU16BE, uint16be } from '@bbn-scan/utils';

import type { Decoded, StakePayload } from './types.js';

export const TAG_LENGTH = 4;
export const KEY_LENGTH = 32;
export const STAKE_PAYLOAD_LENGTH = TAG_LENGTH + 1 + KEY_LENGTH + KEY_LENGTH + 2; // 71

/** "bbn1" */
export const DEFAULT_TAG_HEX = '62626e31';
export const SUPPORTED_VERSIONS: readonly number[] = Object.freeze([0, 1, 2]);

const VERSION_OFFSET = TAG_LENGTH;
const STAKER_OFFSET = VERSION_OFFSET + 1;
const FP_OFFSET = STAKER_OFFSET + KEY_LENGTH;
const TIME_OFFSET = FP_OFFSET + KEY_LENGTH;

export type StakeDecodeOptions = {
  tag: Uint8Array;
  versions: readonly number[];
};

export const DEFAULT_DECODE_OPTIONS: StakeDecodeOptions = Object.freeze({
  tag: hexToBytes(DEFAULT_TAG_HEX),
  versions: SUPPORTED_VERSIONS,
});

/** An x-only key is usable when it is non-zero and lifts to a curve point. */
export function isValidXOnlyKey(key: Uint8Array): boolean {
  if (key.length !== KEY_LENGTH || isAllZero(key)) return false;
  try {
    secp256k1.Point.fromHex('02' + bytesToHex(key));
    return true;
  } catch {
    return false;
  }
}

/**
 * Decode a staking payload. Checks run in a fixed order so a payload that is
 * wrong in several ways always reports the same reason:
 * too-short, bad-magic, unsupported-version, too-long, malformed-key.
 */
export function decodeStakePayload(
  payload: Uint8Array,
  opts: StakeDecodeOptions = DEFAULT_DECODE_OPTIONS
): Decoded<StakePayload> {
  if (opts.tag.length !== TAG_LENGTH) throw new Error(`decodeStakePayload: tag must be ${TAG_LENGTH} bytes`);

  if (payload.length < STAKE_PAYLOAD_LENGTH) return { ok: false, reason: 'too-short' };

  const tag = payload.slice(0, TAG_LENGTH);
  if (!arraysEqual(tag, opts.tag)) return { ok: false, reason: 'bad-magic' };

  const version = payload[VERSION_OFFSET];
  if (!opts.versions.includes(version)) return { ok: false, reason: 'unsupported-version' };

  if (payload.length > STAKE_PAYLOAD_LENGTH) return { ok: false, reason: 'too-long' };

  const stakerPk = payload.slice(STAKER_OFFSET, FP_OFFSET);
  const finalityProviderPk = payload.slice(FP_OFFSET, TIME_OFFSET);
  if (!isValidXOnlyKey(stakerPk) || !isValidXOnlyKey(finalityProviderPk)) {
    return { ok: false, reason: 'malformed-key' };
  }

  return {
    ok: true,
    value: { tag, version, stakerPk, finalityProviderPk, stakingTime: readU16BE(payload, TIME_OFFSET) },
  };
}

/** Inverse of decodeStakePayload for well-formed fields. */
export function encodeStakePayload(fields: StakePayload): Uint8Array {
  if (fields.tag.length !== TAG_LENGTH) throw new Error(`encodeStakePayload: tag must be ${TAG_LENGTH} bytes`);
  if (!Number.isInteger(fields.version) || fields.version < 0 || fields.version > 0xff) {
    throw new Error('encodeStakePayload: version must fit in one byte');
  }
  if (fields.stakerPk.length !== KEY_LENGTH || fields.finalityProviderPk.length !== KEY_LENGTH) {
    throw new Error(`encodeStakePayload: keys must be ${KEY_LENGTH} bytes`);
  }

  return concat(
    fields.tag,
    new Uint8Array([fields.version]),
    fields.stakerPk,
    fields.finalityProviderPk,
    uint16be(fields.stakingTime)
  );
}
