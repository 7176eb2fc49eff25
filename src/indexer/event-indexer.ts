/**
 * EventIndexer - off-ledger indexes built from the event stream
 *
 * The ledger keeps no comments-per-suit list and no per-recipient inbox;
 * both are derived here from CommentCreated / MessageSent / MessageRead.
 * On attach the indexer replays the outbox, then follows live events.
 */

import type { LedgerStateManager } from '../chronicle/ledger-state.js';
import type { Address, LedgerEvent, ObjectId } from '../ledger-types.js';

export interface MessageNotification {
  chatId: ObjectId;
  sender: Address;
  index: number;
  sentAt: number;
  read: boolean;
}

export interface EventIndexerConfig {
  state: LedgerStateManager;
  /** Page size used while replaying the outbox */
  replayPageSize?: number;
}

export class EventIndexer {
  private readonly state: LedgerStateManager;
  private readonly replayPageSize: number;
  private readonly commentsBySuit = new Map<ObjectId, ObjectId[]>();
  private readonly inbox = new Map<Address, MessageNotification[]>();
  private lastSeq = -1;
  private unsubscribe?: () => void;

  constructor(config: EventIndexerConfig) {
    this.state = config.state;
    this.replayPageSize = config.replayPageSize ?? 500;
  }

  /**
   * Catch up on the outbox and start following new events
   */
  start(): void {
    if (this.unsubscribe) {
      return;
    }

    let page = this.state.getEvents(this.lastSeq, this.replayPageSize);
    while (page.length > 0) {
      for (const event of page) {
        this.apply(event);
      }
      page = this.state.getEvents(this.lastSeq, this.replayPageSize);
    }

    this.unsubscribe = this.state.subscribe('*', (event) => this.apply(event));
    console.log(`[Indexer] 📇 Following ledger events from seq ${this.lastSeq + 1}`);
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = undefined;
  }

  getLastSeq(): number {
    return this.lastSeq;
  }

  /**
   * Comment IDs on a suit, oldest first
   */
  getCommentIds(suitId: ObjectId): ObjectId[] {
    return [...(this.commentsBySuit.get(suitId) ?? [])];
  }

  getNotifications(recipient: Address, unreadOnly = false): MessageNotification[] {
    const notifications = this.inbox.get(recipient) ?? [];
    return notifications
      .filter(notification => !unreadOnly || !notification.read)
      .map(notification => ({ ...notification }));
  }

  private apply(event: LedgerEvent): void {
    // Replay and live delivery can overlap at the boundary
    if (event.seq <= this.lastSeq) {
      return;
    }
    this.lastSeq = event.seq;

    switch (event.type) {
      case 'CommentCreated': {
        const { suitId, commentId } = event.data;
        const ids = this.commentsBySuit.get(suitId) ?? [];
        ids.push(commentId);
        this.commentsBySuit.set(suitId, ids);
        break;
      }
      case 'MessageSent': {
        const { chatId, sender, recipient, index } = event.data;
        const notifications = this.inbox.get(recipient) ?? [];
        notifications.push({ chatId, sender, index, sentAt: event.timestamp, read: false });
        this.inbox.set(recipient, notifications);
        break;
      }
      case 'MessageRead': {
        const { chatId, reader, index } = event.data;
        const notification = this.inbox.get(reader)
          ?.find(entry => entry.chatId === chatId && entry.index === index);
        if (notification) {
          notification.read = true;
        }
        break;
      }
      default:
        break;
    }
  }
}
