// packages/cli/src/client.ts

import { BitcoinRpcClient, type NodeClient } from '@bbn-scan/node-client';

import type { RpcConfig } from './config.js';

export type CreateClient = (rpc: RpcConfig) => NodeClient;

export const createRpcClient: CreateClient = (rpc) =>
  new BitcoinRpcClient({
    url: rpc.url,
    username: rpc.username,
    password: rpc.password,
    timeoutMs: rpc.timeoutMs,
  });
