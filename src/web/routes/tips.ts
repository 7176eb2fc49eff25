/**
 * Tip Routes - Creator balances, tipping and withdrawals
 */

import { Router, type RequestHandler } from 'express';
import type { Suits } from '../../suits.js';
import { LedgerError } from '../../errors.js';
import { MIN_TIP } from '../../ledger/tipping.js';
import {
  bodyField,
  getCaller,
  routeHandler,
  validateAmount,
  validateId
} from './validation.js';

export function createTipRoutes(ledger: Suits, requireSigner: RequestHandler): Router {
  const router = Router();
  const { tipping } = ledger;

  router.get('/config', (req, res) => {
    res.json({ success: true, data: { minTip: MIN_TIP } });
  });

  // Open (or look up) a balance; owner defaults to the caller
  router.post('/balances', requireSigner, routeHandler((req, res) => {
    const caller = getCaller(res);
    const ownerField = bodyField(req, 'owner');
    const owner = ownerField === undefined ? caller : validateId(ownerField, 'owner');
    const balanceId = tipping.getOrCreateBalance(caller, owner);
    res.json({ success: true, data: tipping.getBalance(balanceId) });
  }));

  router.get('/balances/by-owner/:address', routeHandler((req, res) => {
    const owner = validateId(req.params.address, 'address');
    const balanceId = tipping.getBalanceId(owner);
    const balance = balanceId === undefined ? undefined : tipping.getBalance(balanceId);
    if (!balance) {
      throw new LedgerError('NotFound', `No tip balance for ${owner}`);
    }
    res.json({ success: true, data: balance });
  }));

  router.get('/balances/:id', routeHandler((req, res) => {
    const balanceId = validateId(req.params.id, 'balance id');
    const balance = tipping.getBalance(balanceId);
    if (!balance) {
      throw new LedgerError('NotFound', `Tip balance ${balanceId} not found`);
    }
    res.json({ success: true, data: balance });
  }));

  router.post('/', requireSigner, routeHandler((req, res) => {
    const suitId = validateId(bodyField(req, 'suitId'), 'suitId');
    const balanceId = validateId(bodyField(req, 'balanceId'), 'balanceId');
    const amount = validateAmount(bodyField(req, 'amount'));
    const balance = tipping.tipSuit(getCaller(res), suitId, balanceId, amount);
    res.json({ success: true, data: balance });
  }));

  router.post('/withdraw', requireSigner, routeHandler((req, res) => {
    const balanceId = validateId(bodyField(req, 'balanceId'), 'balanceId');
    const amount = validateAmount(bodyField(req, 'amount'));
    const balance = tipping.withdraw(getCaller(res), balanceId, amount);
    res.json({ success: true, data: balance });
  }));

  return router;
}
