/**
 * Wallets - native coin held by each address
 *
 * Tips are paid out of the tipper's wallet and withdrawals land in the
 * owner's wallet, inside the same transaction as the ledger update.
 */

import { LedgerError } from '../errors.js';
import { assertAddress, assertAmount, checkedAdd, lookup } from './keys.js';
import type { LedgerStateManager, TxContext } from '../chronicle/ledger-state.js';
import type { Address } from '../ledger-types.js';

export interface WalletsConfig {
  state: LedgerStateManager;
}

export class Wallets {
  private readonly state: LedgerStateManager;

  constructor(config: WalletsConfig) {
    this.state = config.state;
  }

  /**
   * Mint native coin into an address (genesis allocation or faucet)
   */
  fund(sender: Address, owner: Address, amount: number): number {
    const balance = this.state.execute('wallets::fund', sender, (tx) => {
      assertAddress(owner, 'owner');
      if (assertAmount(amount) === 0) {
        throw new LedgerError('InvalidAmount', 'Funding amount must be positive');
      }
      this.credit(tx, owner, amount);
      tx.emit({ type: 'WalletFunded', data: { owner, amount } });
      return lookup(tx.state.wallets, owner) ?? 0;
    });

    console.log(`[Wallets] 🪙 Funded ${owner.slice(0, 8)} with ${amount}`);
    return balance;
  }

  getBalance(owner: Address): number {
    return lookup(this.state.getState().wallets, owner) ?? 0;
  }

  /**
   * @throws LedgerError ArithmeticOverflow when the wallet would pass the safe-integer range
   */
  credit(tx: TxContext, owner: Address, amount: number): void {
    tx.state.wallets[owner] = checkedAdd(lookup(tx.state.wallets, owner) ?? 0, amount, 'Wallet balance');
  }

  /**
   * @throws LedgerError InsufficientFunds when the wallet holds less than amount
   */
  debit(tx: TxContext, owner: Address, amount: number): void {
    const held = lookup(tx.state.wallets, owner) ?? 0;
    if (held < amount) {
      throw new LedgerError('InsufficientFunds', `Wallet holds ${held}, needs ${amount}`);
    }
    tx.state.wallets[owner] = held - amount;
  }
}
