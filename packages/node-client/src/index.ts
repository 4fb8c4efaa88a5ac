// packages/node-client/src/index.ts

export type { Hex, TxOutput, RawTransaction, Block, RequestOptions, NodeClient } from './types.js';
export { NodeClientError, type NodeClientErrorKind } from './errors.js';
export {
  DEFAULT_RETRY_POLICY,
  backoffDelayMs,
  withRetry,
  sleep,
  type RetryPolicy,
  type RetryHooks,
} from './retry.js';
export { readTransaction, parseRawTransactionHex, parseRawBlockHex, type ParsedBlock } from './rawtx.js';
export { BitcoinRpcClient, DEFAULT_RPC_TIMEOUT_MS, type BitcoinRpcClientOptions } from './rpc.js';
