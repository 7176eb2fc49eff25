/**
 * Wallet Routes - Native coin balances and the development faucet
 */

import { Router, type RequestHandler } from 'express';
import type { Suits } from '../../suits.js';
import {
  bodyField,
  getCaller,
  routeHandler,
  validateAmount,
  validateId
} from './validation.js';

export interface WalletRoutesConfig {
  /** Mount POST /faucet (development and test networks only) */
  enableFaucet: boolean;
}

export function createWalletRoutes(
  ledger: Suits,
  requireSigner: RequestHandler,
  config: WalletRoutesConfig
): Router {
  const router = Router();

  router.get('/:address', routeHandler((req, res) => {
    const address = validateId(req.params.address, 'address');
    res.json({ success: true, data: { address, balance: ledger.wallets.getBalance(address) } });
  }));

  if (config.enableFaucet) {
    router.post('/faucet', requireSigner, routeHandler((req, res) => {
      const caller = getCaller(res);
      const amount = validateAmount(bodyField(req, 'amount'));
      const balance = ledger.wallets.fund(caller, caller, amount);
      res.json({ success: true, data: { address: caller, balance } });
    }));
  }

  return router;
}
