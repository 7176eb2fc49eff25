/**
 * Suits Module - Post store
 *
 * Handles:
 * - Creating suits (posts) and registering suit -> creator
 * - The append-only chronological index used for pagination
 * - Denormalized counters, reachable by other modules only through
 *   the SuitCounters interface
 */

import { LedgerError } from '../errors.js';
import { checkedAdd, codePointLength, lookup } from './keys.js';
import type { LedgerStateManager, TxContext } from '../chronicle/ledger-state.js';
import type { Address, ObjectId, Suit, SuitRecord } from '../ledger-types.js';

export const MAX_SUIT_LENGTH = 280;
export const PREVIEW_LENGTH = 100;

/**
 * Counter operations the interaction and tipping ledgers may call.
 * Each runs inside the caller's transaction.
 */
export interface SuitCounters {
  /** @throws LedgerError NotFound for an unknown suit */
  creatorOf(tx: TxContext, suitId: ObjectId): Address;
  incrementLike(tx: TxContext, suitId: ObjectId): void;
  /** Floors at zero */
  decrementLike(tx: TxContext, suitId: ObjectId): void;
  incrementComment(tx: TxContext, suitId: ObjectId): void;
  incrementRetweet(tx: TxContext, suitId: ObjectId): void;
  /** Floors at zero */
  decrementRetweet(tx: TxContext, suitId: ObjectId): void;
  addTipAmount(tx: TxContext, suitId: ObjectId, amount: number): void;
}

export interface SuitsConfig {
  state: LedgerStateManager;
}

function toSuit(record: SuitRecord): Suit {
  return {
    id: record.id,
    creator: record.creator,
    content: record.content,
    mediaUrls: [...record.mediaUrls],
    createdAt: record.createdAt,
    likeCount: record.likeCount,
    commentCount: record.commentCount,
    retweetCount: record.retweetCount,
    tipTotal: record.tipTotal
  };
}

function preview(content: string): string {
  return Array.from(content).slice(0, PREVIEW_LENGTH).join('');
}

export class SuitStore implements SuitCounters {
  private readonly state: LedgerStateManager;

  constructor(config: SuitsConfig) {
    this.state = config.state;
  }

  /**
   * Create a suit owned by the sender
   */
  createSuit(sender: Address, content: string, mediaUrls: readonly string[] = []): Suit {
    const suitId = this.state.execute('suits::create', sender, (tx) => {
      const length = codePointLength(content);
      if (length === 0) {
        throw new LedgerError('EmptyContent', 'Suit content cannot be empty');
      }
      if (length > MAX_SUIT_LENGTH) {
        throw new LedgerError('ContentTooLong', `Suit content exceeds ${MAX_SUIT_LENGTH} characters (${length})`);
      }

      const id = tx.newObjectId();
      tx.state.suits[id] = {
        id,
        creator: tx.sender,
        content,
        mediaUrls: [...mediaUrls],
        createdAt: tx.timestamp,
        likeCount: 0,
        commentCount: 0,
        retweetCount: 0,
        tipTotal: 0
      };
      tx.state.suitIndex.push(id);
      tx.state.suitCreators[id] = tx.sender;

      tx.emit({
        type: 'PostCreated',
        data: { suitId: id, creator: tx.sender, preview: preview(content) }
      });
      return id;
    });

    console.log(`[Suits] 📝 ${sender.slice(0, 8)} posted ${suitId.slice(0, 8)}`);
    return this.requireSuit(suitId);
  }

  /**
   * Newest-first page of suit IDs.
   *
   * Skips the `offset` newest entries; empty once offset reaches the total.
   */
  getRecentSuits(limit: number, offset: number = 0): ObjectId[] {
    const index = this.state.getState().suitIndex;
    const total = index.length;
    if (offset >= total) {
      return [];
    }

    const start = total - offset;
    const end = start > limit ? start - limit : 0;
    const ids: ObjectId[] = [];
    for (let i = start; i > end; i--) {
      ids.push(index[i - 1]);
    }
    return ids;
  }

  /**
   * All suits by one creator, oldest first. Linear in the total suit count.
   */
  getSuitsByCreator(creator: Address): ObjectId[] {
    const { suitIndex, suitCreators } = this.state.getState();
    return Array.from(suitIndex).filter(id => lookup(suitCreators, id) === creator);
  }

  getSuit(suitId: ObjectId): Suit | undefined {
    const record = lookup(this.state.getState().suits, suitId);
    return record ? toSuit(record) : undefined;
  }

  getTotalSuits(): number {
    return this.state.getState().suitIndex.length;
  }

  // =================================================================
  //  SuitCounters
  // =================================================================

  creatorOf(tx: TxContext, suitId: ObjectId): Address {
    const creator = lookup(tx.state.suitCreators, suitId);
    if (creator === undefined) {
      throw new LedgerError('NotFound', `Suit ${suitId} not found`);
    }
    return creator;
  }

  incrementLike(tx: TxContext, suitId: ObjectId): void {
    this.record(tx, suitId).likeCount += 1;
  }

  decrementLike(tx: TxContext, suitId: ObjectId): void {
    const suit = this.record(tx, suitId);
    if (suit.likeCount > 0) {
      suit.likeCount -= 1;
    }
  }

  incrementComment(tx: TxContext, suitId: ObjectId): void {
    this.record(tx, suitId).commentCount += 1;
  }

  incrementRetweet(tx: TxContext, suitId: ObjectId): void {
    this.record(tx, suitId).retweetCount += 1;
  }

  decrementRetweet(tx: TxContext, suitId: ObjectId): void {
    const suit = this.record(tx, suitId);
    if (suit.retweetCount > 0) {
      suit.retweetCount -= 1;
    }
  }

  addTipAmount(tx: TxContext, suitId: ObjectId, amount: number): void {
    const suit = this.record(tx, suitId);
    suit.tipTotal = checkedAdd(suit.tipTotal, amount, 'Suit tip total');
  }

  private record(tx: TxContext, suitId: ObjectId): SuitRecord {
    const suit = lookup(tx.state.suits, suitId);
    if (!suit) {
      throw new LedgerError('NotFound', `Suit ${suitId} not found`);
    }
    return suit;
  }

  private requireSuit(suitId: ObjectId): Suit {
    const suit = this.getSuit(suitId);
    if (!suit) {
      throw new LedgerError('NotFound', `Suit ${suitId} not found`);
    }
    return suit;
  }
}
