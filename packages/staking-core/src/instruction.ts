// packages/staking-core/src/instruction.ts
import { concat, readUint64le, uint64le } from '@epoch-stake/utils';

import { DecodeError } from './errors.js';

export const OPCODE = {
  initialize: 0,
  deposit: 1,
  withdraw: 2,
  startEpoch: 3,
  claim: 4,
} as const;

export type InstructionKind = keyof typeof OPCODE;

export type InitializeInstruction = {
  kind: 'initialize';
  // optional: when omitted both asset ids stay zero
  assets?: { stakeAsset: Uint8Array; rewardAsset: Uint8Array };
};
export type DepositInstruction = { kind: 'deposit'; amount: bigint };
export type WithdrawInstruction = { kind: 'withdraw'; amount: bigint };
export type StartEpochInstruction = {
  kind: 'startEpoch';
  startTime: bigint;
  endTime: bigint;
  rewardAmount: bigint;
};
export type ClaimInstruction = { kind: 'claim' };

export type StakingInstruction =
  | InitializeInstruction
  | DepositInstruction
  | WithdrawInstruction
  | StartEpochInstruction
  | ClaimInstruction;

const INITIALIZE_ASSETS_LEN = 1 + 32 + 32;
const AMOUNT_LEN = 1 + 8;
const START_EPOCH_LEN = 1 + 8 + 8 + 8;

function requirePayload(data: Uint8Array, len: number, kind: InstructionKind) {
  if (data.length < len) {
    throw new DecodeError('TruncatedPayload', `${kind}: expected ${len} bytes, got ${data.length}`, {
      details: { kind, expected: String(len), actual: String(data.length) },
    });
  }
}

/**
 * Bytes past an operation's payload are ignored. For initialize, the 64
 * bytes of asset ids are read only when all of them are present.
 */
export function decodeInstruction(data: Uint8Array): StakingInstruction {
  if (data.length === 0) throw new DecodeError('InvalidOperation', 'empty instruction');

  const op = data[0];
  switch (op) {
    case OPCODE.initialize: {
      // asset ids are optional; anything shorter is a trailer like any other
      if (data.length < INITIALIZE_ASSETS_LEN) return { kind: 'initialize' };
      return {
        kind: 'initialize',
        assets: { stakeAsset: data.slice(1, 33), rewardAsset: data.slice(33, 65) },
      };
    }
    case OPCODE.deposit:
    case OPCODE.withdraw: {
      const kind = op === OPCODE.deposit ? 'deposit' : 'withdraw';
      requirePayload(data, AMOUNT_LEN, kind);
      return { kind, amount: readUint64le(data, 1) };
    }
    case OPCODE.startEpoch: {
      requirePayload(data, START_EPOCH_LEN, 'startEpoch');
      return {
        kind: 'startEpoch',
        startTime: readUint64le(data, 1),
        endTime: readUint64le(data, 9),
        rewardAmount: readUint64le(data, 17),
      };
    }
    case OPCODE.claim:
      return { kind: 'claim' };
    default:
      throw new DecodeError('InvalidOperation', `unrecognized opcode ${String(op)}`, {
        details: { opcode: String(op) },
      });
  }
}

export function encodeInstruction(ix: StakingInstruction): Uint8Array {
  switch (ix.kind) {
    case 'initialize': {
      const op = Uint8Array.of(OPCODE.initialize);
      if (!ix.assets) return op;
      const { stakeAsset, rewardAsset } = ix.assets;
      if (stakeAsset.length !== 32 || rewardAsset.length !== 32) {
        throw new Error('encodeInstruction: asset ids must be 32 bytes');
      }
      return concat(op, stakeAsset, rewardAsset);
    }
    case 'deposit':
      return concat(Uint8Array.of(OPCODE.deposit), uint64le(ix.amount));
    case 'withdraw':
      return concat(Uint8Array.of(OPCODE.withdraw), uint64le(ix.amount));
    case 'startEpoch':
      return concat(
        Uint8Array.of(OPCODE.startEpoch),
        uint64le(ix.startTime),
        uint64le(ix.endTime),
        uint64le(ix.rewardAmount)
      );
    case 'claim':
      return Uint8Array.of(OPCODE.claim);
  }
}
