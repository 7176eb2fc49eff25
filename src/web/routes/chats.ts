/**
 * Chat Routes - Encrypted direct messages
 *
 * Ciphertext and content hashes travel as hex. The server never decrypts.
 */

import { Router, type RequestHandler } from 'express';
import type { Suits } from '../../suits.js';
import { Crypto } from '../../crypto.js';
import { LedgerError } from '../../errors.js';
import type { Message } from '../../ledger-types.js';
import {
  bodyField,
  getCaller,
  routeHandler,
  validateHexBytes,
  validateId,
  validatePositiveInt
} from './validation.js';

function serializeMessage(message: Message) {
  return {
    index: message.index,
    sender: message.sender,
    ciphertext: Crypto.toHex(message.ciphertext),
    contentHash: Crypto.toHex(message.contentHash),
    sentAt: message.sentAt,
    read: message.read
  };
}

export function createChatRoutes(ledger: Suits, requireSigner: RequestHandler): Router {
  const router = Router();
  const { messaging } = ledger;

  router.post('/', requireSigner, routeHandler((req, res) => {
    const other = validateId(bodyField(req, 'other'), 'other');
    const chatId = messaging.startChat(getCaller(res), other);
    res.json({ success: true, data: messaging.getChat(chatId) });
  }));

  router.get('/between/:a/:b', routeHandler((req, res) => {
    const a = validateId(req.params.a, 'address');
    const b = validateId(req.params.b, 'address');
    const chatId = messaging.getChatId(a, b);
    if (chatId === undefined) {
      throw new LedgerError('NotFound', 'No chat between these addresses');
    }
    res.json({ success: true, data: { chatId } });
  }));

  router.get('/of/:address', routeHandler((req, res) => {
    const address = validateId(req.params.address, 'address');
    res.json({ success: true, data: messaging.getChatsFor(address) });
  }));

  // Inbox built by the event indexer
  router.get('/notifications/:address', routeHandler((req, res) => {
    const address = validateId(req.params.address, 'address');
    const unreadOnly = req.query.unread === 'true';
    res.json({ success: true, data: ledger.indexer?.getNotifications(address, unreadOnly) ?? [] });
  }));

  router.get('/:id', routeHandler((req, res) => {
    const chatId = validateId(req.params.id, 'chat id');
    const chat = messaging.getChat(chatId);
    if (!chat) {
      throw new LedgerError('NotFound', `Chat ${chatId} not found`);
    }
    res.json({ success: true, data: chat });
  }));

  router.get('/:id/messages', routeHandler((req, res) => {
    const chatId = validateId(req.params.id, 'chat id');
    res.json({ success: true, data: messaging.getMessages(chatId).map(serializeMessage) });
  }));

  router.get('/:id/unread/:address', routeHandler((req, res) => {
    const chatId = validateId(req.params.id, 'chat id');
    const user = validateId(req.params.address, 'address');
    res.json({ success: true, data: { count: messaging.getUnreadCount(chatId, user) } });
  }));

  router.post('/:id/messages', requireSigner, routeHandler((req, res) => {
    const chatId = validateId(req.params.id, 'chat id');
    const ciphertext = validateHexBytes(bodyField(req, 'ciphertext'), 'ciphertext');
    const contentHash = validateHexBytes(bodyField(req, 'contentHash'), 'contentHash');
    const index = messaging.sendMessage(getCaller(res), chatId, ciphertext, contentHash);
    res.status(201).json({ success: true, data: { chatId, index } });
  }));

  router.post('/:id/messages/:index/read', requireSigner, routeHandler((req, res) => {
    const chatId = validateId(req.params.id, 'chat id');
    const index = validatePositiveInt(req.params.index, 'index', 0);
    messaging.markAsRead(getCaller(res), chatId, index);
    res.json({ success: true, data: { chatId, index } });
  }));

  return router;
}
