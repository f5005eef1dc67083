// packages/cli/src/host/transaction.ts
import {
  arraysEqual,
  bytesToHex,
  concat,
  ensureBytesLen,
  signMessage,
  taggedHash,
  uint16le,
  verifyMessage,
  type Keypair,
} from '@epoch-stake/utils';
import { AuthorizationError } from '@epoch-stake/staking-core';

export type TransactionSignature = {
  identity: Uint8Array;
  signature: Uint8Array;
};

/** `accountKeys[0]` is always the pool account. */
export type Transaction = {
  programId: Uint8Array;
  accountKeys: Uint8Array[];
  instruction: Uint8Array;
  signatures: TransactionSignature[];
};

export type UnsignedTransaction = Omit<Transaction, 'signatures'>;

/**
 * 32-byte digest every signer commits to:
 *   H("epoch-stake/tx", programId || u16le(n) || key_0 .. key_n-1 || instruction)
 */
export function transactionMessage(tx: UnsignedTransaction): Uint8Array {
  const keys = tx.accountKeys.map((k, i) => ensureBytesLen(k, 32, `accountKeys[${i}]`));
  return taggedHash(
    'epoch-stake/tx',
    ensureBytesLen(tx.programId, 32, 'programId'),
    concat(uint16le(keys.length), ...keys),
    tx.instruction
  );
}

export function signTransaction(tx: UnsignedTransaction, signers: Keypair[]): Transaction {
  const msg = transactionMessage(tx);
  return {
    ...tx,
    signatures: signers.map((kp) => ({
      identity: kp.identity,
      signature: signMessage(msg, kp.secretKey),
    })),
  };
}

/**
 * Keys (hex) whose signature checks out. Any signature that fails, or that
 * names a key outside `accountKeys`, rejects the whole transaction.
 */
export function verifySignatures(tx: Transaction): Set<string> {
  const msg = transactionMessage(tx);
  const signers = new Set<string>();

  for (const { identity, signature } of tx.signatures) {
    const id = bytesToHex(identity);
    if (!tx.accountKeys.some((k) => arraysEqual(k, identity))) {
      throw new AuthorizationError('MissingSignature', `signature from ${id} does not match any account key`, {
        details: { key: id },
      });
    }
    if (!verifyMessage(signature, msg, identity)) {
      throw new AuthorizationError('MissingSignature', `signature verification failed for ${id}`, {
        details: { key: id },
      });
    }
    signers.add(id);
  }

  return signers;
}
