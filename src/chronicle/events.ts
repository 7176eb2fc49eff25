/**
 * Typed event emitter for committed ledger events
 */

import type { LedgerEvent, LedgerEventType } from '../ledger-types.js';

export type LedgerEventListener = (event: LedgerEvent) => void;

export class Emitter {
  private listeners: Map<LedgerEventType | '*', LedgerEventListener[]> = new Map();

  /**
   * Subscribe to one event type, or to every event with '*'
   *
   * @returns Function that removes the listener
   */
  on(event: LedgerEventType | '*', listener: LedgerEventListener): () => void {
    const handlers = this.listeners.get(event) ?? [];
    handlers.push(listener);
    this.listeners.set(event, handlers);
    return () => this.off(event, listener);
  }

  emit(event: LedgerEvent): void {
    for (const key of [event.type, '*'] as const) {
      const handlers = this.listeners.get(key);
      if (!handlers) continue;
      // Copy so a listener that unsubscribes does not skip its neighbour
      for (const handler of [...handlers]) {
        try {
          handler(event);
        } catch (error) {
          console.error(`[Events] Listener for ${event.type} failed:`, error);
        }
      }
    }
  }

  off(event: LedgerEventType | '*', listener: LedgerEventListener): void {
    const handlers = this.listeners.get(event);
    if (handlers) {
      const index = handlers.indexOf(listener);
      if (index !== -1) {
        handlers.splice(index, 1);
      }
    }
  }
}
