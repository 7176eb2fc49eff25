/**
 * Suit Routes - Posting, the recent feed and per-suit comment lists
 */

import { Router, type RequestHandler } from 'express';
import type { Suits } from '../../suits.js';
import { LedgerError } from '../../errors.js';
import type { Comment, ObjectId, Suit } from '../../ledger-types.js';
import {
  BadRequestError,
  bodyField,
  getCaller,
  requireString,
  routeHandler,
  validateId,
  validatePositiveInt
} from './validation.js';

const MAX_PAGE_SIZE = 100;

function mediaUrls(value: unknown): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((url): url is string => typeof url === 'string')) {
    throw new BadRequestError('mediaUrls must be an array of strings');
  }
  return value;
}

function resolveSuits(ledger: Suits, ids: ObjectId[]): Suit[] {
  const suits: Suit[] = [];
  for (const id of ids) {
    const suit = ledger.suits.getSuit(id);
    if (suit) suits.push(suit);
  }
  return suits;
}

export function createSuitRoutes(ledger: Suits, requireSigner: RequestHandler): Router {
  const router = Router();

  router.post('/', requireSigner, routeHandler((req, res) => {
    const content = requireString(bodyField(req, 'content'), 'content');
    const suit = ledger.suits.createSuit(getCaller(res), content, mediaUrls(bodyField(req, 'mediaUrls')));
    res.status(201).json({ success: true, data: suit });
  }));

  // Newest first; supports pagination: limit + offset
  router.get('/', routeHandler((req, res) => {
    const limit = validatePositiveInt(req.query.limit, 'limit', 20, MAX_PAGE_SIZE);
    const offset = validatePositiveInt(req.query.offset, 'offset', 0);
    const ids = ledger.suits.getRecentSuits(limit, offset);
    res.json({
      success: true,
      data: {
        suits: resolveSuits(ledger, ids),
        total: ledger.suits.getTotalSuits(),
        limit,
        offset
      }
    });
  }));

  router.get('/by-creator/:address', routeHandler((req, res) => {
    const creator = validateId(req.params.address, 'address');
    res.json({ success: true, data: resolveSuits(ledger, ledger.suits.getSuitsByCreator(creator)) });
  }));

  router.get('/:id', routeHandler((req, res) => {
    const suitId = validateId(req.params.id, 'suit id');
    const suit = ledger.suits.getSuit(suitId);
    if (!suit) {
      throw new LedgerError('NotFound', `Suit ${suitId} not found`);
    }
    res.json({ success: true, data: suit });
  }));

  // Comments come from the event indexer; the ledger keeps no per-suit list
  router.get('/:id/comments', routeHandler((req, res) => {
    const suitId = validateId(req.params.id, 'suit id');
    if (!ledger.suits.getSuit(suitId)) {
      throw new LedgerError('NotFound', `Suit ${suitId} not found`);
    }
    const comments: Comment[] = [];
    for (const commentId of ledger.indexer?.getCommentIds(suitId) ?? []) {
      const comment = ledger.interactions.getComment(commentId);
      if (comment) comments.push(comment);
    }
    res.json({ success: true, data: comments });
  }));

  return router;
}
