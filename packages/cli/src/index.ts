#!/usr/bin/env node
// packages/cli/src/index.ts
/**
 * bbn-stake-scan
 * --------------
 * Scans a window of recent Bitcoin blocks through a Bitcoin Core node and
 * reports Babylon staking activity per finality provider.
 *
 *   bbn-stake-scan scan --window 144
 *   bbn-stake-scan scan --json --out report.json
 *   bbn-stake-scan tx <txid> --height 857910 --params global-params.json
 *
 * Connection settings usually live in .env (BTC_RPC_URL, BTC_RPC_USER, BTC_RPC_PASSWORD).
 */

import dotenv from 'dotenv';

import { isDebugEnabled } from '@bbn-scan/utils';

import { errorMessage } from './errors.js';
import { buildProgram } from './program.js';

dotenv.config();

// --- MUST await parseAsync or Node may exit before Commander prints/help runs ---
(async () => {
  await buildProgram().parseAsync(process.argv);
})().catch((err: unknown) => {
  console.error('❌', errorMessage(err));
  if (isDebugEnabled(process.env) && err instanceof Error) console.error(err.stack);
  process.exitCode = 1;
});
