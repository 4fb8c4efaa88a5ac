// packages/cli/src/report.ts

import fs from 'node:fs';
import path from 'node:path';

import type { RejectionReason, ScanReport } from '@bbn-scan/stake-scan';

export type FinalityProviderEntry = {
  stakeCount: number;
  totalStakedAmount: number;
  distinctStakerCount: number;
  /** floor(total / count), satoshis */
  averageStakeAmount: number;
  versions: number[];
  blockCount: number;
  firstBlockTime: number;
  lastBlockTime: number;
};

export type VersionEntry = {
  stakeCount: number;
  totalStakedAmount: number;
  distinctStakerCount: number;
  finalityProviderCount: number;
};

export type StakeEntry = {
  txid: string;
  blockHeight: number;
  blockTime: number;
  version: number;
  stakerKey: string;
  finalityProviderKey: string;
  stakingTime: number;
  stakedAmount: number;
};

export type ReportDocument = {
  scanWindow: { startHeight: number; endHeight: number };
  totals: {
    blocksScanned: number;
    blocksSkipped: number;
    transactionsExamined: number;
    opReturnPayloads: number;
    stakesDecoded: number;
    rejected: number;
    totalStakedAmount: number;
    distinctStakerCount: number;
    finalityProviderCount: number;
  };
  skippedHeights: number[];
  rejectionsByReason: Record<RejectionReason, number>;
  finalityProviders: Record<string, FinalityProviderEntry>;
  versions: Record<string, VersionEntry>;
  stakes: StakeEntry[];
};

/** Satoshi amounts always fit: 21e14 < 2^53. */
function sats(v: bigint): number {
  const n = Number(v);
  if (!Number.isSafeInteger(n)) throw new RangeError(`amount ${v} does not fit in a JSON number`);
  return n;
}

export function buildReportDocument(report: ScanReport): ReportDocument {
  const finalityProviders: Record<string, FinalityProviderEntry> = {};
  for (const [key, fp] of report.finalityProviders) {
    finalityProviders[key] = {
      stakeCount: fp.stakeCount,
      totalStakedAmount: sats(fp.totalStakedSats),
      distinctStakerCount: fp.stakers.size,
      averageStakeAmount: sats(fp.totalStakedSats / BigInt(fp.stakeCount)),
      versions: [...fp.versions],
      blockCount: fp.blockHeights.length,
      firstBlockTime: fp.firstBlockTime,
      lastBlockTime: fp.lastBlockTime,
    };
  }

  const versions: Record<string, VersionEntry> = {};
  for (const [version, v] of report.versions) {
    versions[String(version)] = {
      stakeCount: v.stakeCount,
      totalStakedAmount: sats(v.totalStakedSats),
      distinctStakerCount: v.stakers.size,
      finalityProviderCount: v.finalityProviders.size,
    };
  }

  return {
    scanWindow: { startHeight: report.window.startHeight, endHeight: report.window.endHeight },
    totals: {
      blocksScanned: report.blocksScanned,
      blocksSkipped: report.blocksSkipped,
      transactionsExamined: report.transactionsExamined,
      opReturnPayloads: report.opReturnPayloads,
      stakesDecoded: report.stakesFound,
      rejected: report.rejected,
      totalStakedAmount: sats(report.totalStakedSats),
      distinctStakerCount: report.distinctStakers,
      finalityProviderCount: report.finalityProviders.size,
    },
    skippedHeights: report.skippedBlocks.map((b) => b.height),
    rejectionsByReason: { ...report.rejectionsByReason },
    finalityProviders,
    versions,
    stakes: report.stakes.map((s) => ({
      txid: s.txid,
      blockHeight: s.blockHeight,
      blockTime: s.blockTime,
      version: s.version,
      stakerKey: s.stakerKey,
      finalityProviderKey: s.finalityProviderKey,
      stakingTime: s.stakingTime,
      stakedAmount: sats(s.stakedSats),
    })),
  };
}

export function formatReportJson(doc: ReportDocument): string {
  return JSON.stringify(doc, null, 2) + '\n';
}

export function formatBtc(v: bigint): string {
  const whole = v / 100_000_000n;
  const frac = (v % 100_000_000n).toString().padStart(8, '0');
  return `${whole}.${frac} BTC`;
}

function shortKey(hex: string): string {
  return `${hex.slice(0, 8)}…${hex.slice(-8)}`;
}

/** Human summary; one line per entry, largest finality providers first. */
export function formatReportSummary(report: ScanReport, opts: { top?: number } = {}): string[] {
  const top = opts.top ?? 10;
  const w = report.window;
  const lines: string[] = [];

  lines.push(`🔎 scanned blocks ${w.startHeight}..${w.endHeight}`);
  lines.push(
    `   blocks: ${report.blocksScanned} scanned, ${report.blocksSkipped} skipped` +
      (report.blocksSkipped ? ` (${report.skippedBlocks.map((b) => b.height).join(', ')})` : '')
  );
  lines.push(`   transactions: ${report.transactionsExamined}, OP_RETURN payloads: ${report.opReturnPayloads}`);
  lines.push(`   stakes: ${report.stakesFound} decoded, ${report.rejected} rejected`);

  const reasons = Object.entries(report.rejectionsByReason).filter(([, n]) => n > 0);
  if (reasons.length) lines.push(`   rejections: ${reasons.map(([r, n]) => `${r}=${n}`).join(', ')}`);

  lines.push(`   total staked: ${formatBtc(report.totalStakedSats)} from ${report.distinctStakers} stakers`);

  const fps = [...report.finalityProviders.values()].sort((a, b) =>
    a.totalStakedSats === b.totalStakedSats ? 0 : a.totalStakedSats > b.totalStakedSats ? -1 : 1
  );
  if (fps.length) {
    lines.push(`   finality providers: ${fps.length}`);
    for (const fp of fps.slice(0, top)) {
      lines.push(
        `   - ${shortKey(fp.finalityProviderKey)}  ${formatBtc(fp.totalStakedSats)}  ` +
          `${fp.stakeCount} stakes, ${fp.stakers.size} stakers`
      );
    }
    if (fps.length > top) lines.push(`   … ${fps.length - top} more`);
  }

  return lines;
}

export function writeReportFile(file: string, doc: ReportDocument): void {
  fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  fs.writeFileSync(file, formatReportJson(doc), 'utf8');
}
