// packages/staking-core/src/address.ts
import { taggedHash, utf8ToBytes } from '@epoch-stake/utils';

// ------------------------------------------------------------------
// Address conventions
// ------------------------------------------------------------------
//
// Every account the program reads is found by a tagged sha256 over the
// program id, so two deployments never share addresses:
//
//   pool      = H("epoch-stake/pool",     programId)
//   position  = H("epoch-stake/position", programId || pool || participant)
//   custody   = H("epoch-stake/custody",  programId || pool || role)

export type CustodyRole = 'stake' | 'reward';

function ensure32(u8: Uint8Array, label: string): Uint8Array {
  if (u8.length !== 32) throw new Error(`${label} must be 32 bytes`);
  return u8;
}

export function defaultProgramId(): Uint8Array {
  return taggedHash('epoch-stake/program', utf8ToBytes('v1'));
}

/** Deterministic asset id for a human label (e.g. "STAKE", "REWARD"). */
export function assetIdFromLabel(label: string): Uint8Array {
  const l = label.trim();
  if (!l) throw new Error('assetIdFromLabel: empty label');
  return taggedHash('epoch-stake/asset', utf8ToBytes(l));
}

export function derivePoolAddress(programId: Uint8Array): Uint8Array {
  return taggedHash('epoch-stake/pool', ensure32(programId, 'programId'));
}

export function derivePositionAddress(args: {
  programId: Uint8Array;
  pool: Uint8Array;
  participant: Uint8Array;
}): Uint8Array {
  const { programId, pool, participant } = args;
  return taggedHash(
    'epoch-stake/position',
    ensure32(programId, 'programId'),
    ensure32(pool, 'pool'),
    ensure32(participant, 'participant')
  );
}

export function deriveCustodyAddress(args: {
  programId: Uint8Array;
  pool: Uint8Array;
  role: CustodyRole;
}): Uint8Array {
  const { programId, pool, role } = args;
  return taggedHash(
    'epoch-stake/custody',
    ensure32(programId, 'programId'),
    ensure32(pool, 'pool'),
    utf8ToBytes(role)
  );
}
