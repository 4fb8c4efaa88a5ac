// packages/cli/src/commands/scan.ts

import type { Command } from 'commander';

import { debugLog } from '@bbn-scan/utils';
import {
  SUPPORTED_VERSIONS,
  scanChainWindow as scanChainWindowDefault,
  type ScanChainWindowParams,
  type ScanReport,
} from '@bbn-scan/stake-scan';

import { createRpcClient, type CreateClient } from '../client.js';
import { loadScanConfig, loadStakingParamsFile, type Env, type ScanFlags } from '../config.js';
import { consoleOutput, type Output } from '../output.js';
import {
  buildReportDocument,
  formatReportJson,
  formatReportSummary,
  writeReportFile,
  type ReportDocument,
} from '../report.js';
import { addDecodeOptions, addRpcOptions } from './options.js';

type ScanOptions = ScanFlags & { json?: boolean };

export type ScanCommandDeps = {
  env?: Env;
  createClient?: CreateClient;
  scanChainWindow?: (params: ScanChainWindowParams) => Promise<ScanReport>;
  readFile?: (file: string) => string;
  writeReport?: (file: string, doc: ReportDocument) => void;
  output?: Output;
  sleep?: (ms: number) => Promise<void>;
};

export function registerScanCommand(program: Command, deps: ScanCommandDeps = {}) {
  const out = deps.output ?? consoleOutput;
  const scan = deps.scanChainWindow ?? scanChainWindowDefault;

  const cmd = program
    .command('scan')
    .description('Scan the most recent blocks for Babylon staking transactions and report per finality provider.')
    .option('--window <N>', `number of blocks ending at the tip (env SCAN_RANGE, default 50)`)
    .option('--concurrency <N>', 'parallel block fetches (env SCAN_CONCURRENCY, default 4)')
    .option('--max-attempts <N>', 'attempts per RPC call (env RPC_MAX_ATTEMPTS, default 3)')
    .option('--timeout <MS>', 'stop fetching after this long; the rest is reported as skipped (env SCAN_TIMEOUT_MS)')
    .option('--out <FILE>', 'write the JSON report to FILE (env REPORT_FILE)')
    .option('--json', 'print the JSON report instead of the summary', false);
  addRpcOptions(cmd);
  addDecodeOptions(cmd);

  cmd.action(async (opts: ScanOptions) => {
    const config = loadScanConfig({ env: deps.env ?? process.env, flags: opts });
    const params = config.paramsFile ? loadStakingParamsFile(config.paramsFile, deps.readFile) : null;
    const client = (deps.createClient ?? createRpcClient)(config.rpc);

    debugLog('scan', 'config', {
      url: config.rpc.url,
      window: config.windowSize,
      concurrency: config.concurrency,
      retry: config.retry,
      tag: config.tagHex,
      params: config.paramsFile ?? '(none)',
    });

    const report = await scan({
      client,
      windowSize: config.windowSize,
      concurrency: config.concurrency,
      retryPolicy: config.retry,
      timeoutMs: config.scanTimeoutMs,
      decode: { tag: config.tag, versions: SUPPORTED_VERSIONS },
      params,
      sleep: deps.sleep,
      onProgress: (p) => {
        out.progress(`scan: blocks ${p.done}/${p.total}...`);
        if (p.done === p.total) out.progress('\n');
      },
    });

    const doc = buildReportDocument(report);

    if (opts.json) out.print(formatReportJson(doc).trimEnd());
    else for (const line of formatReportSummary(report)) out.print(line);

    if (config.reportFile) {
      (deps.writeReport ?? writeReportFile)(config.reportFile, doc);
      out.note(`📝 report written: ${config.reportFile}`);
    }
  });

  return cmd;
}
