// packages/staking-core/src/errors.ts
//
// Every failure the ledger can raise. `kind` is the class (coarse matching with
// instanceof), `code` discriminates the exact condition, `errorNumber` is the
// stable wire value hosts report.

export type StakingErrorKind =
  | 'AuthorizationError'
  | 'StateError'
  | 'ValidationError'
  | 'InsufficientFundsError'
  | 'ArithmeticError'
  | 'DecodeError'
  | 'TransferError';

type CatalogEntry = {
  kind: StakingErrorKind;
  errorNumber: number;
  title: string;
};

export const STAKING_ERROR_CATALOG = {
  MissingSignature: { kind: 'AuthorizationError', errorNumber: 1, title: 'Required signature missing' },
  WrongOwner: { kind: 'AuthorizationError', errorNumber: 2, title: 'Signer is not the recorded owner' },

  Uninitialized: { kind: 'StateError', errorNumber: 10, title: 'Account is not initialized' },
  AlreadyInitialized: { kind: 'StateError', errorNumber: 11, title: 'Account is already initialized' },
  NotOwnedByProgram: { kind: 'StateError', errorNumber: 12, title: 'Account is not owned by this program' },
  InvalidAccountData: { kind: 'StateError', errorNumber: 13, title: 'Account data has the wrong size' },
  InvalidPositionAccount: { kind: 'StateError', errorNumber: 14, title: 'Position account does not belong to the participant' },
  InvalidCustodyAccount: { kind: 'StateError', errorNumber: 15, title: 'Custody account does not belong to the pool' },
  AlreadyClaimed: { kind: 'StateError', errorNumber: 16, title: 'Reward already claimed for this epoch' },

  InvalidArgument: { kind: 'ValidationError', errorNumber: 20, title: 'Invalid argument' },
  NotEnoughAccountKeys: { kind: 'ValidationError', errorNumber: 21, title: 'Not enough accounts supplied' },
  NoActiveEpoch: { kind: 'ValidationError', errorNumber: 22, title: 'No epoch has been started' },

  InsufficientFunds: { kind: 'InsufficientFundsError', errorNumber: 30, title: 'Insufficient staked balance' },

  Overflow: { kind: 'ArithmeticError', errorNumber: 40, title: 'Arithmetic overflow' },
  Underflow: { kind: 'ArithmeticError', errorNumber: 41, title: 'Arithmetic underflow' },

  InvalidOperation: { kind: 'DecodeError', errorNumber: 50, title: 'Unrecognized operation' },
  TruncatedPayload: { kind: 'DecodeError', errorNumber: 51, title: 'Instruction payload is truncated' },

  TransferFailed: { kind: 'TransferError', errorNumber: 60, title: 'Asset transfer failed' },
} as const satisfies Record<string, CatalogEntry>;

export type StakingErrorCode = keyof typeof STAKING_ERROR_CATALOG;

export type CodesForKind<K extends StakingErrorKind> = {
  [C in StakingErrorCode]: (typeof STAKING_ERROR_CATALOG)[C]['kind'] extends K ? C : never;
}[StakingErrorCode];

export type StakingErrorOptions = {
  details?: Record<string, string>;
  cause?: unknown;
};

export abstract class StakingError<C extends StakingErrorCode = StakingErrorCode> extends Error {
  abstract readonly kind: StakingErrorKind;
  readonly code: C;
  readonly errorNumber: number;
  readonly details: Record<string, string>;

  constructor(code: C, message?: string, options: StakingErrorOptions = {}) {
    const entry = STAKING_ERROR_CATALOG[code];
    super(message ?? entry.title, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.errorNumber = entry.errorNumber;
    this.details = options.details ?? {};
  }
}

/** Missing or invalid signer, or a signer that is not the recorded owner. */
export class AuthorizationError extends StakingError<CodesForKind<'AuthorizationError'>> {
  readonly kind = 'AuthorizationError' as const;
}

/** Account lifecycle and ownership violations. */
export class StateError extends StakingError<CodesForKind<'StateError'>> {
  readonly kind = 'StateError' as const;
}

/** Malformed arguments: epoch windows, missing accounts. */
export class ValidationError extends StakingError<CodesForKind<'ValidationError'>> {
  readonly kind = 'ValidationError' as const;
}

export class InsufficientFundsError extends StakingError<CodesForKind<'InsufficientFundsError'>> {
  readonly kind = 'InsufficientFundsError' as const;
}

/** Checked u64/u16 arithmetic failed; values are never wrapped or saturated. */
export class ArithmeticError extends StakingError<CodesForKind<'ArithmeticError'>> {
  readonly kind = 'ArithmeticError' as const;
}

export class DecodeError extends StakingError<CodesForKind<'DecodeError'>> {
  readonly kind = 'DecodeError' as const;
}

/** Raised by (or on behalf of) the asset-transfer collaborator. */
export class TransferError extends StakingError<CodesForKind<'TransferError'>> {
  readonly kind = 'TransferError' as const;
}

export function isStakingError(e: unknown): e is StakingError {
  return e instanceof StakingError;
}

export type StakingErrorJSON = {
  kind: StakingErrorKind | 'InternalError';
  code: StakingErrorCode | 'Unknown';
  errorNumber: number;
  message: string;
  details?: Record<string, string>;
};

export function toErrorJSON(e: unknown): StakingErrorJSON {
  if (isStakingError(e)) {
    const out: StakingErrorJSON = {
      kind: e.kind,
      code: e.code,
      errorNumber: e.errorNumber,
      message: e.message,
    };
    if (Object.keys(e.details).length) out.details = { ...e.details };
    return out;
  }
  return {
    kind: 'InternalError',
    code: 'Unknown',
    errorNumber: 0,
    message: e instanceof Error ? e.message : String(e),
  };
}
