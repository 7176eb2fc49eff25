/**
 * Event Routes - Outbox paging and live updates
 */

import { Router, type Response } from 'express';
import type { Suits } from '../../suits.js';
import type { LedgerEvent } from '../../ledger-types.js';
import { routeHandler, validatePositiveInt } from './validation.js';

const MAX_PAGE_SIZE = 500;
const HEARTBEAT_MS = 30_000;

function writeEvent(client: Response, payload: unknown): void {
  client.write(`data: ${JSON.stringify(payload)}\n\n`);
}

export function createEventRoutes(ledger: Suits): Router {
  const router = Router();

  // Page through committed events: seq > after
  router.get('/', routeHandler((req, res) => {
    const after = req.query.after === undefined ? -1 : validatePositiveInt(req.query.after, 'after', -1);
    const limit = validatePositiveInt(req.query.limit, 'limit', 100, MAX_PAGE_SIZE);
    const events = ledger.getEvents(after, limit);
    res.json({
      success: true,
      data: { events, next: events.length > 0 ? events[events.length - 1].seq : after }
    });
  }));

  // SSE endpoint for live updates
  router.get('/stream', (req, res) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders();

    writeEvent(res, { type: 'connected', timestamp: Date.now(), nextSeq: ledger.state.getEventCount() });

    const unsubscribe = ledger.subscribe('*', (event: LedgerEvent) => {
      writeEvent(res, { type: 'ledger_event', data: event });
    });
    console.log('[SSE] Client connected');

    // Send heartbeat every 30 seconds to keep connection alive
    const heartbeat = setInterval(() => {
      writeEvent(res, { type: 'heartbeat', timestamp: Date.now() });
    }, HEARTBEAT_MS);

    req.on('close', () => {
      clearInterval(heartbeat);
      unsubscribe();
      console.log('[SSE] Client disconnected');
    });
  });

  return router;
}
