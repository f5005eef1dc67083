// packages/staking-core/src/di.ts
//
// Collaborator seams. The host decides who signed, how assets move and where
// account bytes live; the core only sees these shapes.

/**
 * One account passed to an instruction. `data` is the live buffer: handlers
 * write records back into it in place, and the host persists it afterwards.
 */
export type AccountRef = {
  key: Uint8Array; // 32 bytes
  isSigner: boolean;
  owner: Uint8Array; // program tag of the account's storage
  data: Uint8Array;
};

export type TransferArgs = {
  asset: Uint8Array;
  from: AccountRef;
  to: AccountRef;
  amount: bigint;
};

/** Moves value between custodial accounts. Must throw on failure. */
export type AssetTransfer = {
  transfer(args: TransferArgs): void;
};

export type ProgramLog = {
  msg(line: string): void;
};

export type ProcessorDeps = {
  transfer: AssetTransfer;
  log?: ProgramLog;
};

export type HandlerContext = {
  programId: Uint8Array;
  poolAccount: AccountRef;
  /** Operation accounts, i.e. everything after the pool account. */
  accounts: readonly AccountRef[];
  transfer: AssetTransfer;
  log: ProgramLog;
};
