// packages/stake-scan/src/scanWindow.ts

import type { ScanWindow } from './types.js';

/** Last `size` blocks ending at `tip`, clamped at genesis. */
export function computeScanWindow(tip: number, size: number): ScanWindow {
  if (!Number.isSafeInteger(tip) || tip < 0) throw new RangeError(`computeScanWindow: bad tip height ${tip}`);
  if (!Number.isSafeInteger(size) || size < 1) throw new RangeError(`computeScanWindow: bad window size ${size}`);

  return Object.freeze({ startHeight: Math.max(0, tip - size + 1), endHeight: tip });
}

export function windowLength(window: ScanWindow): number {
  return window.endHeight - window.startHeight + 1;
}

/** Each call starts a fresh ascending walk; workers share one iterator. */
export function* windowHeights(window: ScanWindow): Generator<number, void, undefined> {
  for (let h = window.startHeight; h <= window.endHeight; h++) yield h;
}
