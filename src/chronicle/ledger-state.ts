/**
 * LedgerStateManager - transactional ledger document
 *
 * The whole ledger lives in one Automerge document. Each operation runs
 * inside a single Automerge.change(): if the callback throws, Automerge
 * rolls the change back, so registries, objects and the event outbox are
 * updated together or not at all.
 */

import * as A from '@automerge/automerge';
import { Emitter, type LedgerEventListener } from './events.js';
import { SystemHost, type ExecutionHost } from './host.js';
import type {
  Address,
  LedgerEvent,
  LedgerEventInput,
  LedgerEventType,
  LedgerState,
  ObjectId
} from '../ledger-types.js';

/**
 * Handle passed to a transaction body
 */
export interface TxContext {
  readonly label: string;
  readonly sender: Address;
  /** Host time, read once per transaction */
  readonly timestamp: number;
  /** Mutable view of the document, valid only inside the body */
  readonly state: LedgerState;
  newObjectId(): ObjectId;
  /** Queue an event; it reaches the outbox only if the body returns */
  emit(event: LedgerEventInput): void;
}

export type CommitHook = (doc: A.Doc<LedgerState>, events: readonly LedgerEvent[]) => void;

export interface LedgerStateConfig {
  host?: ExecutionHost;
  /** Saved document (Automerge binary) to resume from */
  snapshot?: Uint8Array;
}

/**
 * Sanitize a value for Automerge storage
 *
 * Drops `undefined` (Automerge throws RangeError on it) and copies
 * Uint8Array values so callers cannot mutate stored bytes afterwards.
 */
export function sanitizeForAutomerge<T>(obj: T): T {
  if (obj === null || obj === undefined) {
    return obj;
  }

  if (obj instanceof Uint8Array) {
    return new Uint8Array(obj) as T;
  }

  if (Array.isArray(obj)) {
    return obj
      .filter(item => item !== undefined)
      .map(item => sanitizeForAutomerge(item)) as T;
  }

  if (typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value !== undefined) {
        result[key] = sanitizeForAutomerge(value);
      }
    }
    return result as T;
  }

  return obj;
}

/**
 * Serialize a ledger document (Automerge binary)
 */
export function saveLedgerDocument(doc: A.Doc<LedgerState>): Uint8Array {
  return A.save(doc);
}

export function emptyLedgerState(): LedgerState {
  return {
    usernames: {},
    profileByOwner: {},
    profiles: {},
    suitCreators: {},
    suitIndex: [],
    suits: {},
    likeKeys: {},
    retweetKeys: {},
    likes: {},
    retweets: {},
    comments: {},
    balanceByOwner: {},
    balances: {},
    wallets: {},
    chatKeys: {},
    chats: {},
    events: []
  };
}

export class LedgerStateManager {
  private doc: A.Doc<LedgerState>;
  private readonly host: ExecutionHost;
  private readonly emitter = new Emitter();
  private readonly commitHooks: CommitHook[] = [];

  constructor(config: LedgerStateConfig = {}) {
    this.host = config.host ?? new SystemHost();
    this.doc = config.snapshot
      ? A.load<LedgerState>(config.snapshot)
      : A.from<LedgerState>(emptyLedgerState());
  }

  /**
   * Run one atomic transaction.
   *
   * The body's return value is handed back to the caller; it must be plain
   * data (IDs, numbers), never a reference into the document.
   */
  execute<R>(label: string, sender: Address, body: (tx: TxContext) => R): R {
    const timestamp = this.host.now();
    const committed: LedgerEvent[] = [];
    const outcome: { result?: { value: R } } = {};

    const next = A.change(this.doc, label, (doc: LedgerState) => {
      const pending: LedgerEventInput[] = [];
      const tx: TxContext = {
        label,
        sender,
        timestamp,
        state: doc,
        newObjectId: () => this.host.newObjectId(),
        emit: (event) => {
          pending.push(event);
        }
      };

      outcome.result = { value: body(tx) };

      let seq = doc.events.length;
      for (const input of pending) {
        const event: LedgerEvent = { ...input, seq: seq++, timestamp, tx: label };
        doc.events.push(sanitizeForAutomerge(event));
        committed.push(event);
      }
    });

    if (!outcome.result) {
      throw new Error(`[Ledger] Transaction ${label} produced no result`);
    }

    // Hooks see the new document before it is adopted; a throwing hook
    // (a failed save) aborts the transaction with the old document intact.
    for (const hook of this.commitHooks) {
      try {
        hook(next, committed);
      } catch (error) {
        console.error(`[Ledger] ❌ Commit hook failed, ${label} not applied:`, error);
        throw error;
      }
    }

    this.doc = next;

    for (const event of committed) {
      this.emitter.emit(event);
    }

    return outcome.result.value;
  }

  /**
   * Read-only view of the current document
   */
  getState(): A.Doc<LedgerState> {
    return this.doc;
  }

  /**
   * Page through the outbox
   *
   * @param after - Return events with seq strictly greater than this (-1 for all)
   */
  getEvents(after: number = -1, limit: number = 100): LedgerEvent[] {
    const start = Math.max(0, after + 1);
    return this.doc.events.slice(start, start + limit);
  }

  getEventCount(): number {
    return this.doc.events.length;
  }

  /**
   * Subscribe to committed events
   *
   * @returns Function that removes the listener
   */
  subscribe(type: LedgerEventType | '*', listener: LedgerEventListener): () => void {
    return this.emitter.on(type, listener);
  }

  /**
   * Run for every successful transaction body, before the new document is
   * adopted and before events are delivered. A throw aborts the transaction.
   */
  onCommit(hook: CommitHook): void {
    this.commitHooks.push(hook);
  }

  /**
   * Serialize the document (Automerge binary)
   */
  save(): Uint8Array {
    return saveLedgerDocument(this.doc);
  }
}
