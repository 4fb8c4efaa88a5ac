// packages/utils/src/hash.ts
import { sha256 } from '@noble/hashes/sha2.js';

import { bytesToHex, reverseBytes } from './bytes.js';

/** sha256d(x) = SHA256(SHA256(x)) */
export function sha256d(x: Uint8Array): Uint8Array {
  return sha256(sha256(x));
}

/** Txids and block hashes are displayed as the byte-reversed double hash. */
export function displayHashHex(serialized: Uint8Array): string {
  return bytesToHex(reverseBytes(sha256d(serialized)));
}
