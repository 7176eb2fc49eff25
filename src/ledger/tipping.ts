/**
 * Tipping Module - Creator escrow balances
 *
 * Handles:
 * - Lazy, idempotent creation of one shared balance per owner
 * - Tips: tipper wallet -> creator balance, plus the suit's tip total
 * - Owner-only withdrawals back into the owner's wallet
 *
 * Invariant kept by every operation:
 *   balance == totalReceived - totalWithdrawn
 */

import { LedgerError } from '../errors.js';
import { assertAddress, assertAmount, checkedAdd, lookup } from './keys.js';
import type { LedgerStateManager, TxContext } from '../chronicle/ledger-state.js';
import type { SuitCounters } from './suits.js';
import type { Wallets } from './wallets.js';
import type { Address, ObjectId, TipBalance, TipBalanceRecord } from '../ledger-types.js';

/** Smallest accepted tip, in minor units */
export const MIN_TIP = 1_000_000;

export interface TippingConfig {
  state: LedgerStateManager;
  suits: SuitCounters;
  wallets: Wallets;
}

function toTipBalance(record: TipBalanceRecord): TipBalance {
  return {
    id: record.id,
    owner: record.owner,
    balance: record.balance,
    totalReceived: record.totalReceived,
    totalWithdrawn: record.totalWithdrawn
  };
}

export class TippingLedger {
  private readonly state: LedgerStateManager;
  private readonly suits: SuitCounters;
  private readonly wallets: Wallets;

  constructor(config: TippingConfig) {
    this.state = config.state;
    this.suits = config.suits;
    this.wallets = config.wallets;
  }

  /**
   * Return the owner's balance ID, creating a zero balance on first use
   */
  getOrCreateBalance(sender: Address, owner: Address): ObjectId {
    const existing = lookup(this.state.getState().balanceByOwner, owner);
    if (existing !== undefined) {
      return existing;
    }

    const balanceId = this.state.execute('tipping::get_or_create_balance', sender, (tx) => {
      assertAddress(owner, 'owner');
      const registered = lookup(tx.state.balanceByOwner, owner);
      if (registered !== undefined) {
        return registered;
      }

      const id = tx.newObjectId();
      tx.state.balances[id] = {
        id,
        owner,
        balance: 0,
        totalReceived: 0,
        totalWithdrawn: 0
      };
      tx.state.balanceByOwner[owner] = id;
      tx.emit({ type: 'BalanceCreated', data: { balanceId: id, owner } });
      return id;
    });

    console.log(`[Tipping] 🏦 Opened balance ${balanceId.slice(0, 8)} for ${owner.slice(0, 8)}`);
    return balanceId;
  }

  /**
   * Tip a suit's creator. The payment leaves the sender's wallet and lands
   * in the creator's balance in the same transaction that bumps the suit's
   * tip total.
   */
  tipSuit(sender: Address, suitId: ObjectId, balanceId: ObjectId, payment: number): TipBalance {
    this.state.execute('tipping::tip', sender, (tx) => {
      assertAmount(payment, 'payment');
      if (payment < MIN_TIP) {
        throw new LedgerError('BelowMinimumTip', `Minimum tip is ${MIN_TIP}, got ${payment}`);
      }

      const creator = this.suits.creatorOf(tx, suitId);
      if (creator === tx.sender) {
        throw new LedgerError('SelfTip', 'Cannot tip your own suit');
      }

      const balance = this.record(tx, balanceId);
      if (balance.owner !== creator) {
        throw new LedgerError('BalanceOwnerMismatch', 'Balance does not belong to the suit creator');
      }

      this.wallets.debit(tx, tx.sender, payment);
      balance.balance = checkedAdd(balance.balance, payment, 'Tip balance');
      balance.totalReceived = checkedAdd(balance.totalReceived, payment, 'Total received');
      this.suits.addTipAmount(tx, suitId, payment);

      tx.emit({
        type: 'TipSent',
        data: { suitId, tipper: tx.sender, recipient: creator, amount: payment }
      });
    });

    console.log(`[Tipping] 💸 ${sender.slice(0, 8)} tipped ${payment} on ${suitId.slice(0, 8)}`);
    return this.requireBalance(balanceId);
  }

  /**
   * Move `amount` from the owner's balance into the owner's wallet
   */
  withdraw(sender: Address, balanceId: ObjectId, amount: number): TipBalance {
    this.state.execute('tipping::withdraw', sender, (tx) => {
      if (assertAmount(amount) === 0) {
        throw new LedgerError('InvalidAmount', 'Withdrawal amount must be positive');
      }

      const balance = this.record(tx, balanceId);
      if (balance.owner !== tx.sender) {
        throw new LedgerError('NotOwner', 'Only the balance owner can withdraw');
      }
      if (balance.balance === 0) {
        throw new LedgerError('ZeroBalance', 'Nothing to withdraw');
      }
      if (amount > balance.balance) {
        throw new LedgerError('InsufficientBalance', `Balance is ${balance.balance}, requested ${amount}`);
      }

      balance.balance -= amount;
      balance.totalWithdrawn = checkedAdd(balance.totalWithdrawn, amount, 'Total withdrawn');
      this.wallets.credit(tx, tx.sender, amount);

      tx.emit({ type: 'FundsWithdrawn', data: { balanceId, owner: tx.sender, amount } });
    });

    console.log(`[Tipping] 🏧 ${sender.slice(0, 8)} withdrew ${amount}`);
    return this.requireBalance(balanceId);
  }

  getBalance(balanceId: ObjectId): TipBalance | undefined {
    const record = lookup(this.state.getState().balances, balanceId);
    return record ? toTipBalance(record) : undefined;
  }

  getBalanceId(owner: Address): ObjectId | undefined {
    return lookup(this.state.getState().balanceByOwner, owner);
  }

  private record(tx: TxContext, balanceId: ObjectId): TipBalanceRecord {
    const balance = lookup(tx.state.balances, balanceId);
    if (!balance) {
      throw new LedgerError('NotFound', `Tip balance ${balanceId} not found`);
    }
    return balance;
  }

  private requireBalance(balanceId: ObjectId): TipBalance {
    const balance = this.getBalance(balanceId);
    if (!balance) {
      throw new LedgerError('NotFound', `Tip balance ${balanceId} not found`);
    }
    return balance;
  }
}
