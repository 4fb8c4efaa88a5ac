// packages/stake-scan/src/index.ts

export * from './types.js';
export { classifyOutput, findOpReturnPayload } from './extractOpReturn.js';
export {
  DEFAULT_TAG_HEX,
  SUPPORTED_VERSIONS,
  STAKE_PAYLOAD_LENGTH,
  DEFAULT_DECODE_OPTIONS,
  decodeStakePayload,
  encodeStakePayload,
  isValidXOnlyKey,
  type StakeDecodeOptions,
} from './stakePayload.js';
export {
  StakingParamsError,
  parseStakingParams,
  selectParams,
  checkStakeAgainstParams,
  type StakingParams,
  type StakingParamsVersion,
} from './params.js';
export { STAKING_OUTPUT_INDEX, decodeStakeTransaction, type TxDecodeContext, type BlockRef } from './stakeTx.js';
export { computeScanWindow, windowHeights, windowLength } from './scanWindow.js';
export { StakeAggregator, AggregatorClosedError } from './aggregator.js';
export { ChainTipError } from './errors.js';
export { scanBlock } from './scanBlock.js';
export {
  DEFAULT_CONCURRENCY,
  scanChainWindow,
  type ScanChainWindowParams,
  type ScanProgress,
} from './scanChainWindow.js';
