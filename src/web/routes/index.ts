/**
 * Route Modules Index
 *
 * Exports all route factory functions for use by the main server.
 */

export { createProfileRoutes } from './profiles.js';
export { createSuitRoutes } from './suits.js';
export { createInteractionRoutes } from './interactions.js';
export { createTipRoutes } from './tips.js';
export { createWalletRoutes, type WalletRoutesConfig } from './wallets.js';
export { createChatRoutes } from './chats.js';
export { createEventRoutes } from './events.js';
