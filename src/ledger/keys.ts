/**
 * Registry keys and input checks shared by the ledger modules
 */

import { Crypto } from '../crypto.js';
import { LedgerError } from '../errors.js';
import type { Address, ObjectId } from '../ledger-types.js';

/**
 * Composite key for a (suit, actor) pair: suit ID bytes then address bytes.
 * Both fields are fixed-width 32 bytes, so the concatenation is injective.
 */
export function interactionKey(suitId: ObjectId, actor: Address): string {
  assertAddress(suitId, 'suit id');
  assertAddress(actor, 'actor');
  return Crypto.toHex(Crypto.concat(Crypto.fromHex(suitId), Crypto.fromHex(actor)));
}

/**
 * Registry key for a username: hex of its UTF-8 bytes. Raw names would
 * collide with inherited object keys such as "constructor".
 */
export function usernameKey(username: string): string {
  return Crypto.toHex(new TextEncoder().encode(username));
}

/**
 * Order two addresses so (a, b) and (b, a) give the same pair.
 * Lowercase hex of equal width compares the same as the underlying bytes.
 */
export function canonicalPair(a: Address, b: Address): [Address, Address] {
  return a < b ? [a, b] : [b, a];
}

export function chatPairKey(a: Address, b: Address): string {
  assertAddress(a);
  assertAddress(b);
  const [first, second] = canonicalPair(a, b);
  return Crypto.toHex(Crypto.concat(Crypto.fromHex(first), Crypto.fromHex(second)));
}

/**
 * Length in Unicode code points, not UTF-16 units or bytes
 */
export function codePointLength(value: string): number {
  return Array.from(value).length;
}

export function assertAddress(value: string, field = 'address'): Address {
  if (!Crypto.isHex32(value)) {
    throw new LedgerError('InvalidAddress', `Invalid ${field}: must be 64 lowercase hex characters`);
  }
  return value;
}

/**
 * Amount in minor units: a non-negative safe integer
 */
export function assertAmount(value: number, field = 'amount'): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new LedgerError('InvalidAmount', `Invalid ${field}: must be a non-negative integer of minor units`);
  }
  return value;
}

/**
 * Sum of two amounts, aborting once it leaves the safe-integer range
 */
export function checkedAdd(current: number, amount: number, field: string): number {
  const total = current + amount;
  if (!Number.isSafeInteger(total)) {
    throw new LedgerError('ArithmeticOverflow', `${field} would exceed ${Number.MAX_SAFE_INTEGER}`);
  }
  return total;
}

/**
 * Own-property read from a registry map; inherited names such as
 * "constructor" never count as entries.
 */
export function lookup<V>(map: { readonly [key: string]: V }, key: string): V | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}
