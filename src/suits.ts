/**
 * Suits - Main orchestration class
 *
 * This class wires the ledger modules to one shared state manager:
 * - Profiles (identity registry)
 * - Suits (post store and counters)
 * - Interactions (likes, retweets, comments)
 * - Tipping (creator balances)
 * - Wallets (native coin)
 * - Messaging (encrypted chats)
 * - Indexer (derived indexes from the event stream)
 * - Persistence (document saved after each commit)
 */

import { LedgerStateManager, saveLedgerDocument, type CommitHook } from './chronicle/ledger-state.js';
import type { ExecutionHost } from './chronicle/host.js';
import type { LedgerEventListener } from './chronicle/events.js';
import { ProfileRegistry } from './ledger/profiles.js';
import { SuitStore } from './ledger/suits.js';
import { InteractionLedger } from './ledger/interactions.js';
import { TippingLedger } from './ledger/tipping.js';
import { Wallets } from './ledger/wallets.js';
import { MessagingStore } from './ledger/messaging.js';
import { EventIndexer } from './indexer/event-indexer.js';
import type { LedgerFileStore } from './store/ledger-store.js';
import type { LedgerEvent, LedgerEventType } from './ledger-types.js';

export interface SuitsConfig {
  host?: ExecutionHost;
  /** Load from and save to this store; in-memory when omitted */
  store?: LedgerFileStore;
  /** Build the comment and inbox indexes (default: true) */
  enableIndexer?: boolean;
}

export interface LedgerStats {
  profiles: number;
  suits: number;
  chats: number;
  events: number;
}

export class Suits {
  public readonly state: LedgerStateManager;
  public readonly profiles: ProfileRegistry;
  public readonly suits: SuitStore;
  public readonly interactions: InteractionLedger;
  public readonly tipping: TippingLedger;
  public readonly wallets: Wallets;
  public readonly messaging: MessagingStore;
  public readonly indexer?: EventIndexer;
  private readonly store?: LedgerFileStore;

  constructor(config: SuitsConfig = {}) {
    this.store = config.store;

    // 1. Shared document, resumed from disk when a store is configured
    this.state = new LedgerStateManager({
      host: config.host,
      snapshot: this.store?.load()
    });

    // 2. Persist each transaction before it is applied; a failed save aborts it
    if (this.store) {
      const store = this.store;
      const persist: CommitHook = (doc) => store.save(saveLedgerDocument(doc));
      this.state.onCommit(persist);
    }

    // 3. Ledger modules; interactions and tipping reach suits through SuitCounters
    this.profiles = new ProfileRegistry({ state: this.state });
    this.suits = new SuitStore({ state: this.state });
    this.wallets = new Wallets({ state: this.state });
    this.interactions = new InteractionLedger({ state: this.state, suits: this.suits });
    this.tipping = new TippingLedger({ state: this.state, suits: this.suits, wallets: this.wallets });
    this.messaging = new MessagingStore({ state: this.state });

    // 4. Off-ledger indexes
    if (config.enableIndexer !== false) {
      this.indexer = new EventIndexer({ state: this.state });
      this.indexer.start();
    }

    const stats = this.getStats();
    console.log(`[Suits] ✅ Ledger ready (${stats.profiles} profiles, ${stats.suits} suits, ${stats.events} events)`);
  }

  getEvents(after?: number, limit?: number): LedgerEvent[] {
    return this.state.getEvents(after, limit);
  }

  subscribe(type: LedgerEventType | '*', listener: LedgerEventListener): () => void {
    return this.state.subscribe(type, listener);
  }

  getStats(): LedgerStats {
    const doc = this.state.getState();
    return {
      profiles: Object.keys(doc.profiles).length,
      suits: doc.suitIndex.length,
      chats: Object.keys(doc.chats).length,
      events: doc.events.length
    };
  }

  /**
   * Stop following events
   */
  close(): void {
    this.indexer?.stop();
  }
}
