// packages/stake-scan/src/errors.ts

/** The chain tip could not be read; nothing can be scanned without it. */
export class ChainTipError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChainTipError';
  }
}
