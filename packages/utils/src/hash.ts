// packages/utils/src/hash.ts
import { sha256 as _sha256 } from '@noble/hashes/sha2.js';
import { utf8ToBytes } from '@noble/hashes/utils.js';

import { concat } from './bytes.js';

export { sha256 } from '@noble/hashes/sha2.js';

/**
 * Domain-separated hash used for every derived id in the ledger:
 * sha256(sha256(tag) || sha256(tag) || parts...)
 *
 * Same construction as BIP340 tagged hashes.
 */
export function taggedHash(tag: string, ...parts: Uint8Array[]): Uint8Array {
  const tagHash = _sha256(utf8ToBytes(tag));
  return _sha256(concat(tagHash, tagHash, ...parts));
}

export { utf8ToBytes } from '@noble/hashes/utils.js';
