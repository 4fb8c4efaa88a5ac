// packages/cli/src/commands/tx.ts
//
// Diagnostic: run the extractor and decoder over one transaction.

import type { Command } from 'commander';

import { withRetry } from '@bbn-scan/node-client';
import { SUPPORTED_VERSIONS, decodeStakeTransaction, type StakeRecord } from '@bbn-scan/stake-scan';

import { createRpcClient, type CreateClient } from '../client.js';
import { loadScanConfig, loadStakingParamsFile, type Env, type ScanFlags } from '../config.js';
import { ConfigError } from '../errors.js';
import { consoleOutput, type Output } from '../output.js';
import { formatBtc } from '../report.js';
import { addDecodeOptions, addRpcOptions } from './options.js';

type TxOptions = ScanFlags & { height?: string; json?: boolean };

export type TxCommandDeps = {
  env?: Env;
  createClient?: CreateClient;
  readFile?: (file: string) => string;
  output?: Output;
  sleep?: (ms: number) => Promise<void>;
};

function parseTxid(raw: string): string {
  const txid = raw.trim().toLowerCase();
  if (!/^[0-9a-f]{64}$/.test(txid)) throw new ConfigError(`txid must be 64 hex characters, got "${raw}"`);
  return txid;
}

function parseHeight(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const n = /^\d+$/.test(raw.trim()) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(n)) throw new ConfigError(`--height must be a block height, got "${raw}"`);
  return n;
}

function describeStake(r: StakeRecord): string[] {
  return [
    `✅ stake ${r.txid}`,
    `   version: ${r.version}`,
    `   staker: ${r.stakerKey}`,
    `   finality provider: ${r.finalityProviderKey}`,
    `   staking time: ${r.stakingTime} blocks`,
    `   amount: ${formatBtc(r.stakedSats)} (output ${r.stakingOutputIndex})`,
  ];
}

export function registerTxCommand(program: Command, deps: TxCommandDeps = {}) {
  const out = deps.output ?? consoleOutput;

  const cmd = program
    .command('tx')
    .argument('<txid>', 'transaction id')
    .description('Decode one transaction and show the stake it carries or why it is rejected.')
    .option('--height <H>', 'block height of the transaction; enables the staking parameter checks')
    .option('--json', 'print the result as JSON', false);
  addRpcOptions(cmd);
  addDecodeOptions(cmd);

  cmd.action(async (rawTxid: string, opts: TxOptions) => {
    const txid = parseTxid(rawTxid);
    const height = parseHeight(opts.height);
    const config = loadScanConfig({ env: deps.env ?? process.env, flags: opts });
    const params =
      config.paramsFile && height !== null ? loadStakingParamsFile(config.paramsFile, deps.readFile) : null;
    const client = (deps.createClient ?? createRpcClient)(config.rpc);

    const tx = await withRetry(() => client.getRawTransaction(txid), config.retry, { sleep: deps.sleep });
    const cls = decodeStakeTransaction(
      tx,
      { height: height ?? 0, time: 0 },
      { decode: { tag: config.tag, versions: SUPPORTED_VERSIONS }, params }
    );

    if (opts.json) {
      const body =
        cls.kind === 'stake'
          ? { kind: cls.kind, ...cls.record, stakedSats: Number(cls.record.stakedSats) }
          : { txid, ...cls };
      out.print(JSON.stringify(body, null, 2));
      return;
    }

    if (cls.kind === 'no-payload') {
      out.print(`ℹ️  ${txid} has no OP_RETURN output`);
    } else if (cls.kind === 'rejected') {
      out.print(`⚠️  ${txid} rejected: ${cls.reason} (OP_RETURN output ${cls.opReturnOutputIndex})`);
    } else {
      for (const line of describeStake(cls.record)) out.print(line);
      if (height === null) out.print('   (no --height given: staking parameters not checked)');
    }
  });

  return cmd;
}
