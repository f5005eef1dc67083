// packages/cli/src/host/ledger.ts
import { arraysEqual, bytesToHex, isU64 } from '@epoch-stake/utils';
import { getBalance, setBalance, type AccountStore } from '@epoch-stake/account-store';
import { TransferError, type AssetTransfer, type TransferArgs } from '@epoch-stake/staking-core';

type Entry = { asset: Uint8Array; holder: Uint8Array; amount: bigint };

/**
 * Balance overlay over the store. Reads fall through to the store, writes
 * stay here until `commit()`; dropping the object discards them.
 */
export class StagedBalances {
  private readonly staged = new Map<string, Entry>();

  constructor(private readonly store: AccountStore) {}

  private slot(asset: Uint8Array, holder: Uint8Array): string {
    return `${bytesToHex(asset)}:${bytesToHex(holder)}`;
  }

  get(asset: Uint8Array, holder: Uint8Array): bigint {
    return this.staged.get(this.slot(asset, holder))?.amount ?? getBalance(this.store, asset, holder);
  }

  set(asset: Uint8Array, holder: Uint8Array, amount: bigint): void {
    this.staged.set(this.slot(asset, holder), { asset: asset.slice(), holder: holder.slice(), amount });
  }

  /** Move `amount` without any authorization check. */
  move(asset: Uint8Array, from: Uint8Array, to: Uint8Array, amount: bigint): void {
    const available = this.get(asset, from);
    if (available < amount) {
      throw new TransferError('TransferFailed', `insufficient balance: have ${available}, need ${amount}`, {
        details: { holder: bytesToHex(from), asset: bytesToHex(asset) },
      });
    }
    if (arraysEqual(from, to)) return;

    const credited = this.get(asset, to) + amount;
    if (!isU64(credited)) {
      throw new TransferError('TransferFailed', 'recipient balance would exceed u64', {
        details: { holder: bytesToHex(to), asset: bytesToHex(asset) },
      });
    }

    this.set(asset, from, available - amount);
    this.set(asset, to, credited);
  }

  commit(): void {
    for (const { asset, holder, amount } of this.staged.values()) setBalance(this.store, asset, holder, amount);
    this.staged.clear();
  }
}

/**
 * Transfer collaborator handed to the program. The source must have signed
 * the transaction or be an account the program owns.
 */
export function makeLedgerTransfer(args: { balances: StagedBalances; programId: Uint8Array }): AssetTransfer {
  const { balances, programId } = args;
  return {
    transfer({ asset, from, to, amount }: TransferArgs) {
      if (!from.isSigner && !arraysEqual(from.owner, programId)) {
        throw new TransferError('TransferFailed', `source ${bytesToHex(from.key)} is neither a signer nor program-owned`, {
          details: { holder: bytesToHex(from.key) },
        });
      }
      balances.move(asset, from.key, to.key, amount);
    },
  };
}
