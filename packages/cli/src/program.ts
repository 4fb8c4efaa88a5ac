// packages/cli/src/program.ts

import { Command } from 'commander';

import { registerScanCommand, type ScanCommandDeps } from './commands/scan.js';
import { registerTxCommand, type TxCommandDeps } from './commands/tx.js';

export const VERSION = '0.1.0';

export function buildProgram(deps: ScanCommandDeps & TxCommandDeps = {}): Command {
  const program = new Command();
  program
    .name('bbn-stake-scan')
    .description('Find Babylon Bitcoin staking transactions in recent blocks and summarise them per finality provider.')
    .version(VERSION);

  registerScanCommand(program, deps);
  registerTxCommand(program, deps);
  return program;
}
