/**
 * Execution host - clock and object identity for ledger transactions
 */

import { Crypto } from '../crypto.js';
import type { ObjectId } from '../ledger-types.js';

export interface ExecutionHost {
  /** Current wall-clock time in milliseconds */
  now(): number;
  /** Allocate a globally unique object identity */
  newObjectId(): ObjectId;
}

/**
 * Default host: system clock and 32 random bytes per object
 */
export class SystemHost implements ExecutionHost {
  now(): number {
    return Date.now();
  }

  newObjectId(): ObjectId {
    return Crypto.toHex(Crypto.randomBytes(32));
  }
}
