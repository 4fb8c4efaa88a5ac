// packages/cli/src/config.ts
//
// Settings come from flags, then the environment (.env is loaded by the entry
// point), then defaults. Everything is validated up front.

import fs from 'node:fs';

import { hexToBytes } from '@bbn-scan/utils';
import { DEFAULT_RPC_TIMEOUT_MS, DEFAULT_RETRY_POLICY, type RetryPolicy } from '@bbn-scan/node-client';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_TAG_HEX,
  StakingParamsError,
  parseStakingParams,
  type StakingParams,
} from '@bbn-scan/stake-scan';

import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_WINDOW = 50;
export const MAX_WINDOW = 1_000_000;
export const MAX_CONCURRENCY = 64;
export const MAX_ATTEMPTS = 10;

export type Env = Record<string, string | undefined>;

/** Raw commander option values; all optional, all strings. */
export type ScanFlags = {
  rpcUrl?: string;
  rpcUser?: string;
  rpcPassword?: string;
  window?: string;
  concurrency?: string;
  maxAttempts?: string;
  timeout?: string;
  tag?: string;
  params?: string;
  out?: string;
};

export type RpcConfig = {
  url: string;
  username?: string;
  password?: string;
  timeoutMs: number;
};

export type ScanConfig = {
  rpc: RpcConfig;
  windowSize: number;
  concurrency: number;
  retry: RetryPolicy;
  scanTimeoutMs?: number;
  tagHex: string;
  tag: Uint8Array;
  paramsFile?: string;
  reportFile?: string;
};

type Setting = { env: string; flag?: string };

const S = {
  url: { env: 'BTC_RPC_URL', flag: '--rpc-url' },
  user: { env: 'BTC_RPC_USER', flag: '--rpc-user' },
  password: { env: 'BTC_RPC_PASSWORD', flag: '--rpc-password' },
  window: { env: 'SCAN_RANGE', flag: '--window' },
  concurrency: { env: 'SCAN_CONCURRENCY', flag: '--concurrency' },
  attempts: { env: 'RPC_MAX_ATTEMPTS', flag: '--max-attempts' },
  backoff: { env: 'RPC_BACKOFF_MS' },
  rpcTimeout: { env: 'RPC_TIMEOUT_MS' },
  scanTimeout: { env: 'SCAN_TIMEOUT_MS', flag: '--timeout' },
  tag: { env: 'BBN_TAG', flag: '--tag' },
  params: { env: 'BBN_PARAMS_FILE', flag: '--params' },
  out: { env: 'REPORT_FILE', flag: '--out' },
} satisfies Record<string, Setting>;

function label(s: Setting): string {
  return s.flag ? `${s.env} (${s.flag})` : s.env;
}

function pick(flag: string | undefined, env: Env, s: Setting): string | undefined {
  const v = (flag ?? env[s.env])?.trim();
  return v ? v : undefined;
}

function intSetting(raw: string | undefined, s: Setting, min: number, max: number, fallback: number): number;
function intSetting(raw: string | undefined, s: Setting, min: number, max: number): number | undefined;
function intSetting(raw: string | undefined, s: Setting, min: number, max: number, fallback?: number): number | undefined {
  if (raw === undefined) return fallback;
  const n = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(n) || n < min || n > max) {
    throw new ConfigError(`${label(s)} must be an integer in ${min}..${max}, got "${raw}"`);
  }
  return n;
}

function urlSetting(raw: string | undefined): string {
  if (raw === undefined) throw new ConfigError(`${label(S.url)} is required`);
  let u: URL;
  try {
    u = new URL(raw);
  } catch {
    throw new ConfigError(`${label(S.url)} is not a valid URL, got "${raw}"`);
  }
  if (u.protocol !== 'http:' && u.protocol !== 'https:') {
    throw new ConfigError(`${label(S.url)} must be an http(s) URL, got "${raw}"`);
  }
  return raw;
}

function tagSetting(raw: string | undefined): string {
  const tagHex = (raw ?? DEFAULT_TAG_HEX).toLowerCase();
  if (!/^[0-9a-f]{8}$/.test(tagHex)) throw new ConfigError(`${label(S.tag)} must be 4 bytes of hex, got "${raw}"`);
  return tagHex;
}

/** Settings needed to talk to the node; shared by every command. */
export function loadRpcConfig(args: { env: Env; flags: ScanFlags }): RpcConfig {
  const { env, flags } = args;
  const username = pick(flags.rpcUser, env, S.user);
  const password = pick(flags.rpcPassword, env, S.password);
  return {
    url: urlSetting(pick(flags.rpcUrl, env, S.url)),
    ...(username === undefined ? {} : { username }),
    ...(password === undefined ? {} : { password }),
    timeoutMs: intSetting(pick(undefined, env, S.rpcTimeout), S.rpcTimeout, 1, 600_000, DEFAULT_RPC_TIMEOUT_MS),
  };
}

export function loadScanConfig(args: { env: Env; flags: ScanFlags }): Readonly<ScanConfig> {
  const { env, flags } = args;

  const tagHex = tagSetting(pick(flags.tag, env, S.tag));
  const scanTimeoutMs = intSetting(pick(flags.timeout, env, S.scanTimeout), S.scanTimeout, 1, Number.MAX_SAFE_INTEGER);
  const paramsFile = pick(flags.params, env, S.params);
  const reportFile = pick(flags.out, env, S.out);

  return Object.freeze({
    rpc: Object.freeze(loadRpcConfig(args)),
    windowSize: intSetting(pick(flags.window, env, S.window), S.window, 1, MAX_WINDOW, DEFAULT_WINDOW),
    concurrency: intSetting(
      pick(flags.concurrency, env, S.concurrency),
      S.concurrency,
      1,
      MAX_CONCURRENCY,
      DEFAULT_CONCURRENCY
    ),
    retry: Object.freeze({
      maxAttempts: intSetting(
        pick(flags.maxAttempts, env, S.attempts),
        S.attempts,
        1,
        MAX_ATTEMPTS,
        DEFAULT_RETRY_POLICY.maxAttempts
      ),
      baseDelayMs: intSetting(pick(undefined, env, S.backoff), S.backoff, 0, 60_000, DEFAULT_RETRY_POLICY.baseDelayMs),
      maxDelayMs: DEFAULT_RETRY_POLICY.maxDelayMs,
    }),
    ...(scanTimeoutMs === undefined ? {} : { scanTimeoutMs }),
    tagHex,
    tag: hexToBytes(tagHex),
    ...(paramsFile === undefined ? {} : { paramsFile }),
    ...(reportFile === undefined ? {} : { reportFile }),
  });
}

export function loadStakingParamsFile(
  file: string,
  readFile: (p: string) => string = (p) => fs.readFileSync(p, 'utf8')
): StakingParams {
  let doc: unknown;
  try {
    doc = JSON.parse(readFile(file));
  } catch (e) {
    throw new ConfigError(`${label(S.params)}: cannot read ${file}: ${errorMessage(e)}`, { cause: e });
  }
  try {
    return parseStakingParams(doc);
  } catch (e) {
    if (e instanceof StakingParamsError) throw new ConfigError(`${label(S.params)}: ${e.message}`, { cause: e });
    throw e;
  }
}
