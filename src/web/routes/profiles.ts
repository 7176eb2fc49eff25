/**
 * Profile Routes - Usernames and profiles
 */

import { Router, type Request, type RequestHandler } from 'express';
import type { Suits } from '../../suits.js';
import { LedgerError } from '../../errors.js';
import type { ProfileInput } from '../../ledger/profiles.js';
import {
  bodyField,
  getCaller,
  optionalString,
  requireString,
  routeHandler,
  validateId
} from './validation.js';

function profileInput(req: Request): ProfileInput {
  return {
    username: requireString(bodyField(req, 'username'), 'username'),
    bio: optionalString(bodyField(req, 'bio'), 'bio'),
    avatarUrl: optionalString(bodyField(req, 'avatarUrl'), 'avatarUrl')
  };
}

export function createProfileRoutes(ledger: Suits, requireSigner: RequestHandler): Router {
  const router = Router();

  // Create the caller's profile
  router.post('/', requireSigner, routeHandler((req, res) => {
    const profile = ledger.profiles.createProfile(getCaller(res), profileInput(req));
    res.status(201).json({ success: true, data: profile });
  }));

  // Update bio/avatar, renaming when the username changes
  router.put('/:id', requireSigner, routeHandler((req, res) => {
    const profileId = validateId(req.params.id, 'profile id');
    const profile = ledger.profiles.updateProfile(getCaller(res), profileId, profileInput(req));
    res.json({ success: true, data: profile });
  }));

  router.get('/available/:username', routeHandler((req, res) => {
    const { username } = req.params;
    res.json({
      success: true,
      data: { username, available: ledger.profiles.isUsernameAvailable(username) }
    });
  }));

  router.get('/by-username/:username', routeHandler((req, res) => {
    const owner = ledger.profiles.getOwnerByUsername(req.params.username);
    res.json({
      success: true,
      data: { owner, profile: ledger.profiles.getProfileByOwner(owner) ?? null }
    });
  }));

  router.get('/by-owner/:address', routeHandler((req, res) => {
    const owner = validateId(req.params.address, 'address');
    const profile = ledger.profiles.getProfileByOwner(owner);
    if (!profile) {
      throw new LedgerError('NotFound', `No profile for ${owner}`);
    }
    res.json({ success: true, data: profile });
  }));

  router.get('/:id', routeHandler((req, res) => {
    const profileId = validateId(req.params.id, 'profile id');
    const profile = ledger.profiles.getProfile(profileId);
    if (!profile) {
      throw new LedgerError('NotFound', `Profile ${profileId} not found`);
    }
    res.json({ success: true, data: profile });
  }));

  return router;
}
