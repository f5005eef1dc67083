// packages/utils/src/keys.ts
import { schnorr } from '@noble/curves/secp256k1.js';
import { randomBytes } from '@noble/hashes/utils.js';

import { bytesToHex, hexToBytes } from './bytes.js';

/** A participant identity is a 32-byte BIP340 x-only public key. */
export const IDENTITY_LEN = 32;
export const SIGNATURE_LEN = 64;

export type Keypair = {
  secretKey: Uint8Array;
  identity: Uint8Array;
};

export function identityFromSecret(secretKey: Uint8Array): Uint8Array {
  if (secretKey.length !== 32) throw new Error('identityFromSecret: secret key must be 32 bytes');
  return schnorr.getPublicKey(secretKey);
}

export function keypairFromSecretHex(secretHex: string): Keypair {
  const secretKey = hexToBytes(secretHex);
  return { secretKey, identity: identityFromSecret(secretKey) };
}

/** Fresh random keypair; retries the (negligible) case of an out-of-range scalar. */
export function generateKeypair(): Keypair {
  for (let attempt = 0; attempt < 8; attempt++) {
    const secretKey = randomBytes(32);
    try {
      return { secretKey, identity: schnorr.getPublicKey(secretKey) };
    } catch (e) {
      if (attempt === 7) throw e;
    }
  }
  throw new Error('generateKeypair: exhausted attempts');
}

export function signMessage(message32: Uint8Array, secretKey: Uint8Array): Uint8Array {
  if (message32.length !== 32) throw new Error('signMessage: message must be 32 bytes');
  return schnorr.sign(message32, secretKey);
}

export function verifyMessage(signature: Uint8Array, message32: Uint8Array, identity: Uint8Array): boolean {
  if (signature.length !== SIGNATURE_LEN || identity.length !== IDENTITY_LEN) return false;
  try {
    return schnorr.verify(signature, message32, identity);
  } catch {
    // malformed point or scalar
    return false;
  }
}

export function shortId(identity: Uint8Array, n = 8): string {
  const hex = bytesToHex(identity);
  return hex.length > n ? `${hex.slice(0, n)}…` : hex;
}
