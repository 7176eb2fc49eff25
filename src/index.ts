/**
 * Suits - Social ledger
 *
 * Profiles, posts ("suits"), likes/retweets/comments, creator tipping and
 * encrypted chats as atomic transactions over shared registries.
 */

// Main orchestration
export { Suits } from './suits.js';
export type { SuitsConfig, LedgerStats } from './suits.js';

// Execution host and transactional state
export { LedgerStateManager, emptyLedgerState, saveLedgerDocument } from './chronicle/ledger-state.js';
export type { TxContext, CommitHook, LedgerStateConfig } from './chronicle/ledger-state.js';
export { SystemHost } from './chronicle/host.js';
export type { ExecutionHost } from './chronicle/host.js';
export type { LedgerEventListener } from './chronicle/events.js';

// Ledger modules
export { ProfileRegistry, USERNAME_MIN_LENGTH, USERNAME_MAX_LENGTH } from './ledger/profiles.js';
export type { ProfileInput } from './ledger/profiles.js';
export { SuitStore, MAX_SUIT_LENGTH, PREVIEW_LENGTH } from './ledger/suits.js';
export type { SuitCounters } from './ledger/suits.js';
export { InteractionLedger } from './ledger/interactions.js';
export { TippingLedger, MIN_TIP } from './ledger/tipping.js';
export { Wallets } from './ledger/wallets.js';
export { MessagingStore } from './ledger/messaging.js';
export { interactionKey, chatPairKey, canonicalPair, usernameKey } from './ledger/keys.js';

// Indexing and persistence
export { EventIndexer } from './indexer/event-indexer.js';
export type { MessageNotification } from './indexer/event-indexer.js';
export { LedgerFileStore } from './store/ledger-store.js';

// Client helpers
export { sealMessage, openMessage, verifyContentHash } from './client/sealed-message.js';
export type { SealedMessage } from './client/sealed-message.js';
export { signRequest, signingPayload } from './web/auth.js';

// Web API
export { SuitsWebServer } from './web/server.js';
export type { WebServerConfig } from './web/server.js';

// Errors, crypto and config
export { LedgerError, isLedgerError, statusForCategory } from './errors.js';
export type { ErrorCategory, LedgerErrorCode } from './errors.js';
export { Crypto } from './crypto.js';
export { loadConfig, getSuitsDataDir } from './config.js';
export type { SuitsEnvConfig } from './config.js';

export type * from './ledger-types.js';
