// packages/cli/src/commands/options.ts

import type { Command } from 'commander';

export function addRpcOptions(cmd: Command): Command {
  return cmd
    .option('--rpc-url <URL>', 'Bitcoin Core JSON-RPC endpoint (env BTC_RPC_URL)')
    .option('--rpc-user <USER>', 'RPC username (env BTC_RPC_USER)')
    .option('--rpc-password <PASSWORD>', 'RPC password (env BTC_RPC_PASSWORD)');
}

export function addDecodeOptions(cmd: Command): Command {
  return cmd
    .option('--tag <HEX>', '4-byte payload tag (env BBN_TAG, default 62626e31)')
    .option('--params <FILE>', 'staking parameters JSON (env BBN_PARAMS_FILE)');
}
