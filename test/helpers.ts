/**
 * Shared fixtures for ledger tests
 */

import assert from 'node:assert/strict';
import { isLedgerError, type LedgerErrorCode } from '../src/errors.js';
import type { ExecutionHost } from '../src/chronicle/host.js';
import { Suits, type SuitsConfig } from '../src/suits.js';
import type { ObjectId } from '../src/ledger-types.js';

export const START_TIME = 1_700_000_000_000;

export const ALICE = 'a'.repeat(64);
export const BOB = 'b'.repeat(64);
export const CAROL = 'c'.repeat(64);

/** An ID no test host ever allocates */
export const UNKNOWN_ID = 'f'.repeat(64);

/**
 * The nth object ID a fresh TestHost hands out (1-based)
 */
export function objectId(n: number): ObjectId {
  return n.toString(16).padStart(64, '0');
}

/**
 * Deterministic host: fixed clock, sequential object IDs
 */
export class TestHost implements ExecutionHost {
  private time: number;
  private counter: number;

  constructor(time = START_TIME, lastId = 0) {
    this.time = time;
    this.counter = lastId;
  }

  now(): number {
    return this.time;
  }

  newObjectId(): ObjectId {
    this.counter += 1;
    return objectId(this.counter);
  }

  advance(ms: number): void {
    this.time += ms;
  }
}

export function createLedger(host: ExecutionHost = new TestHost(), config: Omit<SuitsConfig, 'host'> = {}): Suits {
  return new Suits({ ...config, host });
}

/**
 * Assert that fn throws a LedgerError with the given code
 */
export function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): void {
  assert.throws(fn, (error: unknown) => {
    assert.ok(isLedgerError(error), `Expected LedgerError ${code}, got ${String(error)}`);
    assert.equal(error.code, code);
    return true;
  });
}
