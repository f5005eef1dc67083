// packages/staking-core/src/accounts.ts
import { arraysEqual, bytesToHex } from '@epoch-stake/utils';

import type { AccountRef, HandlerContext, TransferArgs } from './di.js';
import type { PoolRecord, PositionRecord } from './records.js';
import { packPositionRecord, unpackPositionRecord } from './records.js';
import { deriveCustodyAddress, derivePositionAddress, type CustodyRole } from './address.js';
import {
  AuthorizationError,
  StateError,
  TransferError,
  ValidationError,
  isStakingError,
} from './errors.js';

export function accountAt(accounts: readonly AccountRef[], index: number, label: string): AccountRef {
  const acc = accounts[index];
  if (!acc) {
    throw new ValidationError('NotEnoughAccountKeys', `missing ${label} account (index ${index})`, {
      details: { index: String(index), supplied: String(accounts.length) },
    });
  }
  return acc;
}

export function requireSigner(acc: AccountRef, label: string): void {
  if (!acc.isSigner) {
    throw new AuthorizationError('MissingSignature', `${label} must be a signer`, {
      details: { key: bytesToHex(acc.key) },
    });
  }
}

export function requireProgramOwned(acc: AccountRef, programId: Uint8Array, label: string): void {
  if (!arraysEqual(acc.owner, programId)) {
    throw new StateError('NotOwnedByProgram', `${label} account is not owned by this program`, {
      details: { key: bytesToHex(acc.key), owner: bytesToHex(acc.owner) },
    });
  }
}

export function requireCustody(ctx: HandlerContext, acc: AccountRef, role: CustodyRole): void {
  const expected = deriveCustodyAddress({ programId: ctx.programId, pool: ctx.poolAccount.key, role });
  if (!arraysEqual(acc.key, expected)) {
    throw new StateError('InvalidCustodyAccount', `${role} custody account does not belong to this pool`, {
      details: { expected: bytesToHex(expected), actual: bytesToHex(acc.key) },
    });
  }
}

/**
 * Decode a participant's position after checking that the account is the
 * participant's derived, program-owned position account. An initialized
 * position must already be bound to the same participant.
 */
export function loadPosition(
  ctx: HandlerContext,
  acc: AccountRef,
  participant: Uint8Array,
  opts: { requireInitialized: boolean }
): PositionRecord {
  requireProgramOwned(acc, ctx.programId, 'position');

  const expected = derivePositionAddress({
    programId: ctx.programId,
    pool: ctx.poolAccount.key,
    participant,
  });
  if (!arraysEqual(acc.key, expected)) {
    throw new StateError('InvalidPositionAccount', 'position account does not belong to the participant', {
      details: { expected: bytesToHex(expected), actual: bytesToHex(acc.key) },
    });
  }

  const position = unpackPositionRecord(acc.data);

  if (!position.initialized) {
    if (opts.requireInitialized) throw new StateError('Uninitialized', 'User account is not initialized');
    return position;
  }

  if (!arraysEqual(position.owner, participant)) {
    throw new AuthorizationError('WrongOwner', 'position is owned by another participant', {
      details: { owner: bytesToHex(position.owner), signer: bytesToHex(participant) },
    });
  }
  return position;
}

export function storePosition(acc: AccountRef, position: PositionRecord): void {
  packPositionRecord(position, acc.data);
}

/**
 * Call the transfer collaborator. Failures that are not already ledger
 * errors surface as TransferError with the original as cause.
 */
export function invokeTransfer(ctx: HandlerContext, args: TransferArgs): void {
  try {
    ctx.transfer.transfer(args);
  } catch (e) {
    if (isStakingError(e)) throw e;
    throw new TransferError('TransferFailed', e instanceof Error ? e.message : String(e), {
      cause: e,
      details: { amount: args.amount.toString(), asset: bytesToHex(args.asset) },
    });
  }
}

export function isPoolOwner(pool: PoolRecord, key: Uint8Array): boolean {
  return arraysEqual(pool.owner, key);
}
