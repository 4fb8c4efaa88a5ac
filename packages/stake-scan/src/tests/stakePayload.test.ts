// packages/stake-scan/src/tests/stakePayload.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { bytesToHex, concat, hexToBytes } from '@bbn-scan/utils';

import { decodeStakePayload, encodeStakePayload, isValidXOnlyKey, STAKE_PAYLOAD_LENGTH } from '../stakePayload.js';
import { FP_1, STAKER_A, stakePayload } from './fixtures.js';

function reasonOf(payload: Uint8Array, opts?: Parameters<typeof decodeStakePayload>[1]): string {
  const r = decodeStakePayload(payload, opts);
  return r.ok ? 'ok' : r.reason;
}

test('encodes the 71-byte layout and decodes it back', () => {
  const payload = stakePayload({ version: 1, stakingTime: 0x1234 });

  assert.equal(payload.length, STAKE_PAYLOAD_LENGTH);
  assert.equal(bytesToHex(payload.slice(0, 5)), '62626e3101');
  assert.equal(bytesToHex(payload.slice(69)), '1234');

  const r = decodeStakePayload(payload);
  assert.ok(r.ok);
  assert.equal(r.value.version, 1);
  assert.equal(r.value.stakingTime, 0x1234);
  assert.deepEqual(r.value.stakerPk, STAKER_A);
  assert.deepEqual(r.value.finalityProviderPk, FP_1);
  assert.deepEqual(encodeStakePayload(r.value), payload);
});

test('accepts every recognised version and rejects others', () => {
  for (const version of [0, 1, 2]) assert.equal(reasonOf(stakePayload({ version })), 'ok');
  assert.equal(reasonOf(stakePayload({ version: 3 })), 'unsupported-version');
  assert.equal(reasonOf(stakePayload({ version: 0xff })), 'unsupported-version');
});

test('rejects short payloads', () => {
  assert.equal(reasonOf(new Uint8Array()), 'too-short');
  assert.equal(reasonOf(stakePayload().slice(0, 70)), 'too-short');
  assert.equal(reasonOf(hexToBytes('62626e31')), 'too-short');
});

test('rejects a foreign tag', () => {
  const p = stakePayload();
  p[0] = 0x00;
  assert.equal(reasonOf(p), 'bad-magic');
});

test('honours a configured tag', () => {
  const tag = hexToBytes('01020304');
  const p = stakePayload({ tagHex: '01020304' });

  assert.equal(reasonOf(p), 'bad-magic');
  assert.equal(reasonOf(p, { tag, versions: [0] }), 'ok');
});

test('rejects trailing bytes after the layout', () => {
  assert.equal(reasonOf(concat(stakePayload(), Uint8Array.from([0x00]))), 'too-long');
});

test('reports the earliest failing check', () => {
  const long = concat(stakePayload({ version: 9 }), Uint8Array.from([0x00]));
  assert.equal(reasonOf(long), 'unsupported-version');

  long[1] = 0x00;
  assert.equal(reasonOf(long), 'bad-magic');

  const shortAndForeign = new Uint8Array(10);
  assert.equal(reasonOf(shortAndForeign), 'too-short');
});

test('rejects keys that are zero or not on the curve', () => {
  const zero = new Uint8Array(32);
  const beyondField = new Uint8Array(32).fill(0xff);

  assert.equal(reasonOf(stakePayload({ staker: zero })), 'malformed-key');
  assert.equal(reasonOf(stakePayload({ fp: beyondField })), 'malformed-key');

  assert.equal(isValidXOnlyKey(FP_1), true);
  assert.equal(isValidXOnlyKey(zero), false);
  assert.equal(isValidXOnlyKey(beyondField), false);
  assert.equal(isValidXOnlyKey(FP_1.slice(1)), false);
});

test('encode refuses fields that do not fit the layout', () => {
  const base = { tag: hexToBytes('62626e31'), version: 0, stakerPk: STAKER_A, finalityProviderPk: FP_1, stakingTime: 1 };

  assert.throws(() => encodeStakePayload({ ...base, tag: hexToBytes('6262') }), /tag must be 4 bytes/);
  assert.throws(() => encodeStakePayload({ ...base, version: 256 }), /one byte/);
  assert.throws(() => encodeStakePayload({ ...base, stakerPk: STAKER_A.slice(2) }), /keys must be 32 bytes/);
});
