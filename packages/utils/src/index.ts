// packages/utils/src/index.ts

export {
  hexToBytes,
  bytesToHex,
  concat,
  arraysEqual,
  reverseBytes,
  isAllZero,
  readU16BE,
  readU32LE,
  readU64LE,
  uint16be,
  uint32le,
  uint64le,
} from './bytes.js';

export { varInt, decodeVarInt, type DecodedVarInt } from './varint.js';

export { sha256d, displayHashHex } from './hash.js';

export {
  OP_RETURN,
  OP_1,
  OP_PUSHDATA1,
  OP_PUSHDATA2,
  OP_PUSHDATA4,
  pushDataPrefix,
  pushData,
  readPushHeader,
  isTaprootScript,
  taprootScript,
  type PushHeader,
} from './script.js';

export { debugLog, isDebugEnabled } from './debug.js';
