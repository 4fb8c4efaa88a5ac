// packages/stake-scan/src/tests/params.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { parseStakingParams, selectParams, StakingParamsError } from '../params.js';

const v = (over: Record<string, unknown>) => ({
  version: 0,
  activation_height: 100,
  min_staking_amount: 10,
  max_staking_amount: 20,
  min_staking_time: 1,
  max_staking_time: 2,
  ...over,
});

test('parses versions and converts amounts to bigint', () => {
  const p = parseStakingParams({ versions: [v({ cap_height: 150, covenant_quorum: 6 })] });

  assert.deepEqual(p.versions, [
    {
      version: 0,
      activationHeight: 100,
      capHeight: 150,
      minStakingAmount: 10n,
      maxStakingAmount: 20n,
      minStakingTime: 1,
      maxStakingTime: 2,
    },
  ]);
});

test('rejects documents that do not describe usable versions', () => {
  assert.throws(() => parseStakingParams(null), StakingParamsError);
  assert.throws(() => parseStakingParams({ versions: [] }), /non-empty array/);
  assert.throws(() => parseStakingParams({ versions: [v({ activation_height: '100' })] }), /versions\[0\]\.activation_height/);
  assert.throws(() => parseStakingParams({ versions: [v({ min_staking_amount: 30 })] }), /min_staking_amount exceeds/);
  assert.throws(() => parseStakingParams({ versions: [v({ cap_height: 50 })] }), /cap_height is below/);
});

test('selects the entry for the version active at a height', () => {
  const p = parseStakingParams({
    versions: [v({ version: 0, cap_height: 199 }), v({ version: 1, activation_height: 200 })],
  });

  assert.equal(selectParams(p, 99, 0), null);
  assert.equal(selectParams(p, 150, 0)?.version, 0);
  assert.equal(selectParams(p, 200, 0), null);
  assert.equal(selectParams(p, 150, 1), null);
  assert.equal(selectParams(p, 10_000, 1)?.version, 1);
});

test('reads an optional payload tag per version', () => {
  const p = parseStakingParams({ versions: [v({ tag: '62626E31' }), v({ version: 1 })] });

  assert.equal(p.versions[0]?.tag, '62626e31');
  assert.equal(p.versions[1]?.tag, undefined);
  assert.throws(() => parseStakingParams({ versions: [v({ tag: 'bbn1' })] }), /versions\[0\]\.tag must be 4 bytes of hex/);
  assert.throws(() => parseStakingParams({ versions: [v({ tag: 0x62626e31 })] }), StakingParamsError);
});
