// packages/node-client/src/rpc.ts
import axios, { type AxiosInstance } from 'axios';

import { NodeClientError } from './errors.js';
import { parseRawBlockHex, parseRawTransactionHex, type ParsedBlock } from './rawtx.js';
import type { Block, Hex, NodeClient, RawTransaction, RequestOptions } from './types.js';

export const DEFAULT_RPC_TIMEOUT_MS = 10_000;

// bitcoind RPC error codes
const RPC_INVALID_ADDRESS_OR_KEY = -5;
const RPC_INVALID_PARAMETER = -8;
const RPC_IN_WARMUP = -28;

const HEX_64 = /^[0-9a-f]{64}$/;

export type BitcoinRpcClientOptions = {
  url: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
  /** preconfigured axios instance (tests inject one with a custom adapter) */
  http?: AxiosInstance;
};

type RpcEnvelope = {
  result: unknown;
  error: { code: number; message: string } | null;
};

function isRpcEnvelope(data: unknown): data is RpcEnvelope {
  if (typeof data !== 'object' || data === null) return false;
  if (!('result' in data) || !('error' in data)) return false;

  const { error } = data;
  if (error === null) return true;
  return (
    typeof error === 'object' &&
    'code' in error &&
    typeof error.code === 'number' &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

function kindForRpcCode(code: number): NodeClientError['kind'] {
  if (code === RPC_INVALID_ADDRESS_OR_KEY || code === RPC_INVALID_PARAMETER) return 'not-found';
  if (code === RPC_IN_WARMUP) return 'unavailable';
  return 'rejected';
}

function kindForHttpStatus(status: number): NodeClientError['kind'] {
  if (status === 404) return 'not-found';
  if (status === 401 || status === 403) return 'rejected';
  return 'unavailable';
}

function translateTransportError(method: string, e: unknown, signal?: AbortSignal): NodeClientError {
  if (axios.isCancel(e) || signal?.aborted) {
    return new NodeClientError('aborted', method, 'request cancelled');
  }
  if (axios.isAxiosError(e)) {
    const code = e.code ? ` (${e.code})` : '';
    return new NodeClientError('unavailable', method, `${e.message}${code}`, e.code);
  }
  return new NodeClientError('unavailable', method, errorMessage(e));
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function expectHexString(method: string, value: unknown): string {
  if (typeof value !== 'string' || value.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(value)) {
    throw new NodeClientError('malformed', method, `expected hex string, got ${typeof value}`);
  }
  return value.toLowerCase();
}

/**
 * Bitcoin Core JSON-RPC 1.0 client. Blocks and transactions are requested in
 * raw form and decoded locally so output values stay exact satoshi integers.
 */
export class BitcoinRpcClient implements NodeClient {
  private readonly http: AxiosInstance;
  private readonly url: string;
  private readonly auth?: { username: string; password: string };
  private nextId = 0;

  constructor(opts: BitcoinRpcClientOptions) {
    this.url = opts.url;
    this.http =
      opts.http ??
      axios.create({
        timeout: opts.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS,
        headers: { 'content-type': 'application/json' },
      });
    if (opts.username !== undefined) {
      this.auth = { username: opts.username, password: opts.password ?? '' };
    }
  }

  async call(method: string, params: unknown[] = [], opts: RequestOptions = {}): Promise<unknown> {
    const body = { jsonrpc: '1.0', id: `bbn-scan-${++this.nextId}`, method, params };

    let status: number;
    let data: unknown;
    try {
      const res = await this.http.post<unknown>(this.url, body, {
        auth: this.auth,
        signal: opts.signal,
        // bitcoind reports RPC errors with non-2xx statuses; inspect the body ourselves
        validateStatus: () => true,
      });
      status = res.status;
      data = res.data;
    } catch (e) {
      throw translateTransportError(method, e, opts.signal);
    }

    if (isRpcEnvelope(data)) {
      if (data.error) {
        throw new NodeClientError(kindForRpcCode(data.error.code), method, data.error.message, data.error.code);
      }
      if (status >= 200 && status < 300) return data.result;
    }

    if (status < 200 || status >= 300) {
      throw new NodeClientError(kindForHttpStatus(status), method, `HTTP ${status}`, status);
    }
    throw new NodeClientError('unavailable', method, 'response is not a JSON-RPC envelope');
  }

  async getBlockCount(): Promise<number> {
    const result = await this.call('getblockcount');
    if (typeof result !== 'number' || !Number.isInteger(result) || result < 0) {
      throw new NodeClientError('malformed', 'getblockcount', `expected non-negative integer, got ${String(result)}`);
    }
    return result;
  }

  async getBlockByHeight(height: number, opts: RequestOptions = {}): Promise<Block> {
    const hash = expectHexString('getblockhash', await this.call('getblockhash', [height], opts));
    if (!HEX_64.test(hash)) throw new NodeClientError('malformed', 'getblockhash', `bad block hash "${hash}"`);

    const rawHex = expectHexString('getblock', await this.call('getblock', [hash, 0], opts));

    let parsed: ParsedBlock;
    try {
      parsed = parseRawBlockHex(rawHex);
    } catch (e) {
      throw new NodeClientError('malformed', 'getblock', `block ${height}: ${errorMessage(e)}`);
    }
    if (parsed.hash !== hash) {
      throw new NodeClientError('malformed', 'getblock', `block ${height}: header hashes to ${parsed.hash}, expected ${hash}`);
    }

    return { height, hash, time: parsed.time, transactions: parsed.transactions };
  }

  async getRawTransaction(txid: Hex, opts: RequestOptions = {}): Promise<RawTransaction> {
    const rawHex = expectHexString('getrawtransaction', await this.call('getrawtransaction', [txid, false], opts));

    let tx: RawTransaction;
    try {
      tx = parseRawTransactionHex(rawHex);
    } catch (e) {
      throw new NodeClientError('malformed', 'getrawtransaction', `${txid}: ${errorMessage(e)}`);
    }
    if (tx.txid !== txid.toLowerCase()) {
      throw new NodeClientError('malformed', 'getrawtransaction', `payload hashes to ${tx.txid}, expected ${txid}`);
    }
    return tx;
  }
}
