// packages/stake-scan/src/scanChainWindow.ts

import { debugLog } from '@bbn-scan/utils';
import {
  DEFAULT_RETRY_POLICY,
  NodeClientError,
  withRetry,
  type NodeClient,
  type RetryHooks,
  type RetryPolicy,
} from '@bbn-scan/node-client';

import { StakeAggregator } from './aggregator.js';
import { ChainTipError } from './errors.js';
import { scanBlock } from './scanBlock.js';
import { computeScanWindow, windowHeights, windowLength } from './scanWindow.js';
import type { TxDecodeContext } from './stakeTx.js';
import type { ScanReport, ScanWindow } from './types.js';

export const DEFAULT_CONCURRENCY = 4;

export type ScanProgress = {
  done: number;
  total: number;
  window: ScanWindow;
};

export type ScanChainWindowParams = TxDecodeContext & {
  client: NodeClient;
  windowSize: number;
  concurrency?: number;
  retryPolicy?: RetryPolicy;

  /** abort the whole run after this long; unfinished blocks count as skipped */
  timeoutMs?: number;
  signal?: AbortSignal;

  onProgress?: (p: ScanProgress) => void;
  /** injected in tests */
  sleep?: RetryHooks['sleep'];
};

/**
 * Scan the last `windowSize` blocks below the current tip for staking payloads.
 * Blocks are fetched by a bounded pool of workers; a block that still fails
 * after retries is recorded as skipped and the run continues.
 */
export async function scanChainWindow(params: ScanChainWindowParams): Promise<ScanReport> {
  const {
    client,
    windowSize,
    concurrency = DEFAULT_CONCURRENCY,
    retryPolicy = DEFAULT_RETRY_POLICY,
    timeoutMs,
    onProgress,
    sleep,
  } = params;
  const ctx: TxDecodeContext = { decode: params.decode, params: params.params };

  if (!Number.isSafeInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`scanChainWindow: concurrency must be a positive integer (got ${concurrency})`);
  }

  let tip: number;
  try {
    tip = await withRetry(() => client.getBlockCount(), retryPolicy, {
      signal: params.signal,
      sleep,
      onRetry: (attempt, err, delayMs) => debugLog('scan', `tip attempt ${attempt} failed, retrying in ${delayMs}ms`, err),
    });
  } catch (err) {
    if (err instanceof NodeClientError) throw new ChainTipError(`could not read chain tip: ${err.message}`, { cause: err });
    throw err;
  }

  const window = computeScanWindow(tip, windowSize);
  const total = windowLength(window);
  const agg = new StakeAggregator(window);
  debugLog('scan', `window ${window.startHeight}..${window.endHeight} (${total} blocks), ${concurrency} workers`);

  const run = new AbortController();
  const onOuterAbort = () => run.abort();
  if (params.signal?.aborted) run.abort();
  else params.signal?.addEventListener('abort', onOuterAbort, { once: true });
  const timer = timeoutMs !== undefined ? setTimeout(() => run.abort(), timeoutMs) : undefined;

  const heights = windowHeights(window);
  let done = 0;

  const scanHeight = async (height: number): Promise<void> => {
    if (run.signal.aborted) {
      agg.recordSkippedBlock(height, 'aborted');
      return;
    }

    try {
      const block = await withRetry((attempt) => {
        if (attempt > 1) debugLog('scan', `block ${height}: attempt ${attempt}`);
        return client.getBlockByHeight(height, { signal: run.signal });
      }, retryPolicy, { signal: run.signal, sleep });
      agg.ingestBlock(scanBlock(block, ctx));
    } catch (err) {
      if (!(err instanceof NodeClientError)) throw err;
      const cause = run.signal.aborted ? 'aborted' : err.kind;
      debugLog('scan', `block ${height} skipped (${cause})`, err.message);
      agg.recordSkippedBlock(height, cause);
    }
  };

  const worker = async (): Promise<void> => {
    for (let next = heights.next(); !next.done; next = heights.next()) {
      await scanHeight(next.value);
      done += 1;
      onProgress?.({ done, total, window });
    }
  };

  try {
    const workers = Array.from({ length: Math.min(concurrency, total) }, () => worker());
    await Promise.all(workers);
  } finally {
    // releases fetches still in flight when a worker threw
    run.abort();
    if (timer !== undefined) clearTimeout(timer);
    params.signal?.removeEventListener('abort', onOuterAbort);
  }

  return agg.snapshot();
}
