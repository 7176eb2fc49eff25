/**
 * Interaction Routes - Likes, retweets and comments
 */

import { Router, type RequestHandler } from 'express';
import type { Suits } from '../../suits.js';
import { LedgerError } from '../../errors.js';
import {
  bodyField,
  getCaller,
  requireString,
  routeHandler,
  validateId
} from './validation.js';

export function createInteractionRoutes(ledger: Suits, requireSigner: RequestHandler): Router {
  const router = Router();
  const { interactions } = ledger;

  // =================================================================
  //  Likes
  // =================================================================

  router.post('/likes', requireSigner, routeHandler((req, res) => {
    const suitId = validateId(bodyField(req, 'suitId'), 'suitId');
    res.status(201).json({ success: true, data: interactions.likeSuit(getCaller(res), suitId) });
  }));

  // Body carries the suit the like is expected to belong to
  router.delete('/likes/:id', requireSigner, routeHandler((req, res) => {
    const likeId = validateId(req.params.id, 'like id');
    const suitId = validateId(bodyField(req, 'suitId'), 'suitId');
    interactions.unlikeSuit(getCaller(res), likeId, suitId);
    res.json({ success: true, data: { likeId, suitId } });
  }));

  router.get('/likes/status', routeHandler((req, res) => {
    const suitId = validateId(req.query.suitId, 'suitId');
    const user = validateId(req.query.user, 'user');
    res.json({ success: true, data: { liked: interactions.hasLiked(suitId, user) } });
  }));

  router.get('/likes/:id', routeHandler((req, res) => {
    const likeId = validateId(req.params.id, 'like id');
    const like = interactions.getLike(likeId);
    if (!like) {
      throw new LedgerError('NotFound', `Like ${likeId} not found`);
    }
    res.json({ success: true, data: like });
  }));

  // =================================================================
  //  Retweets
  // =================================================================

  router.post('/retweets', requireSigner, routeHandler((req, res) => {
    const suitId = validateId(bodyField(req, 'suitId'), 'suitId');
    res.status(201).json({ success: true, data: interactions.retweetSuit(getCaller(res), suitId) });
  }));

  router.delete('/retweets/:id', requireSigner, routeHandler((req, res) => {
    const retweetId = validateId(req.params.id, 'retweet id');
    const suitId = validateId(bodyField(req, 'suitId'), 'suitId');
    interactions.unretweetSuit(getCaller(res), retweetId, suitId);
    res.json({ success: true, data: { retweetId, suitId } });
  }));

  router.get('/retweets/status', routeHandler((req, res) => {
    const suitId = validateId(req.query.suitId, 'suitId');
    const user = validateId(req.query.user, 'user');
    res.json({ success: true, data: { retweeted: interactions.hasRetweeted(suitId, user) } });
  }));

  router.get('/retweets/:id', routeHandler((req, res) => {
    const retweetId = validateId(req.params.id, 'retweet id');
    const retweet = interactions.getRetweet(retweetId);
    if (!retweet) {
      throw new LedgerError('NotFound', `Retweet ${retweetId} not found`);
    }
    res.json({ success: true, data: retweet });
  }));

  // =================================================================
  //  Comments
  // =================================================================

  router.post('/comments', requireSigner, routeHandler((req, res) => {
    const suitId = validateId(bodyField(req, 'suitId'), 'suitId');
    const content = requireString(bodyField(req, 'content'), 'content');
    res.status(201).json({ success: true, data: interactions.commentOnSuit(getCaller(res), suitId, content) });
  }));

  router.get('/comments/:id', routeHandler((req, res) => {
    const commentId = validateId(req.params.id, 'comment id');
    const comment = interactions.getComment(commentId);
    if (!comment) {
      throw new LedgerError('NotFound', `Comment ${commentId} not found`);
    }
    res.json({ success: true, data: comment });
  }));

  // Markers held by an address, as its wallet would list them
  router.get('/owned/:address', routeHandler((req, res) => {
    const owner = validateId(req.params.address, 'address');
    res.json({
      success: true,
      data: {
        likes: interactions.getOwnedLikes(owner),
        retweets: interactions.getOwnedRetweets(owner)
      }
    });
  }));

  return router;
}
