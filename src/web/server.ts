/**
 * Suits Web API Server
 *
 * JSON API over the ledger. Reads are public; every mutation is a signed
 * request whose verified address is the transaction sender.
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { Server } from 'http';
import type { Suits } from '../suits.js';
import { DEFAULT_PORT, DEFAULT_SIGNATURE_WINDOW_MS } from '../config.js';
import { SignatureVerifier } from './auth.js';
import {
  createProfileRoutes,
  createSuitRoutes,
  createInteractionRoutes,
  createTipRoutes,
  createWalletRoutes,
  createChatRoutes,
  createEventRoutes
} from './routes/index.js';
import { getErrorMessage } from './routes/validation.js';

export interface RateLimitSettings {
  /** Requests per minute per client across the API (default: 100) */
  apiPerMinute?: number;
  /** Mutations per minute per client (default: 30) */
  writesPerMinute?: number;
}

export interface WebServerConfig {
  ledger: Suits;
  port?: number;
  production?: boolean;
  allowedOrigins?: string[];
  trustProxy?: boolean;
  enableFaucet?: boolean;
  signatureWindowMs?: number;
  rateLimits?: RateLimitSettings;
  /** Clock for signature freshness checks */
  now?: () => number;
}

/**
 * Errors raised by body parsing carry an HTTP status
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

export class SuitsWebServer {
  private readonly app: express.Application;
  private readonly ledger: Suits;
  private readonly verifier: SignatureVerifier;
  private readonly port: number;
  private readonly production: boolean;
  private readonly allowedOrigins: string[];
  private readonly trustProxy: boolean;
  private readonly enableFaucet: boolean;
  private readonly rateLimits: Required<RateLimitSettings>;
  private server?: Server;

  constructor(config: WebServerConfig) {
    this.ledger = config.ledger;
    this.port = config.port ?? DEFAULT_PORT;
    this.production = config.production ?? false;
    this.allowedOrigins = config.allowedOrigins ?? [];
    this.trustProxy = config.trustProxy ?? false;
    this.enableFaucet = config.enableFaucet ?? false;
    this.rateLimits = {
      apiPerMinute: config.rateLimits?.apiPerMinute ?? 100,
      writesPerMinute: config.rateLimits?.writesPerMinute ?? 30
    };
    this.verifier = new SignatureVerifier({
      windowMs: config.signatureWindowMs ?? DEFAULT_SIGNATURE_WINDOW_MS,
      now: config.now
    });
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    // Behind nginx/reverse proxy, rate limiting must see the real client IP
    if (this.trustProxy || this.production) {
      this.app.set('trust proxy', 1);
    }

    // Security headers
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      res.setHeader('X-Frame-Options', 'DENY');
      res.setHeader('X-Content-Type-Options', 'nosniff');
      res.setHeader('X-XSS-Protection', '1; mode=block');
      res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
      res.setHeader('Permissions-Policy', 'geolocation=(), microphone=(), camera=()');
      if (this.production) {
        res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
      }
      next();
    });

    // CORS - restrict to allowed origins
    this.app.use(cors({
      origin: (origin, callback) => {
        // Same-origin and non-browser clients send no origin
        if (!origin) return callback(null, true);
        if (!this.production) {
          if (origin.includes('localhost') || origin.includes('127.0.0.1')) {
            return callback(null, true);
          }
        }
        if (this.allowedOrigins.length === 0 || this.allowedOrigins.includes(origin)) {
          return callback(null, true);
        }
        callback(new Error('CORS not allowed'));
      },
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Suits-Address', 'X-Suits-Timestamp', 'X-Suits-Signature']
    }));

    const writeLimiter = rateLimit({
      windowMs: 60 * 1000,
      limit: this.rateLimits.writesPerMinute,
      skip: (req) => req.method === 'GET' || req.method === 'OPTIONS',
      message: { success: false, error: 'Too many transactions, please slow down' },
      standardHeaders: true,
      legacyHeaders: false
    });
    const apiLimiter = rateLimit({
      windowMs: 60 * 1000,
      limit: this.rateLimits.apiPerMinute,
      message: { success: false, error: 'Too many requests, please slow down' },
      standardHeaders: true,
      legacyHeaders: false
    });

    this.app.use('/api/', writeLimiter);
    this.app.use('/api/', apiLimiter);

    this.app.use(express.json({ limit: '256kb' }));
  }

  /**
   * Setup API routes
   */
  private setupRoutes(): void {
    const requireSigner = this.verifier.createMiddleware();

    this.app.get('/api/health', (req, res) => {
      res.json({ success: true, status: 'online', data: this.ledger.getStats() });
    });

    this.app.use('/api/profiles', createProfileRoutes(this.ledger, requireSigner));
    this.app.use('/api/suits', createSuitRoutes(this.ledger, requireSigner));
    this.app.use('/api/interactions', createInteractionRoutes(this.ledger, requireSigner));
    this.app.use('/api/tips', createTipRoutes(this.ledger, requireSigner));
    this.app.use('/api/wallets', createWalletRoutes(this.ledger, requireSigner, { enableFaucet: this.enableFaucet }));
    this.app.use('/api/chats', createChatRoutes(this.ledger, requireSigner));
    this.app.use('/api/events', createEventRoutes(this.ledger));

    this.app.use('/api', (req, res) => {
      res.status(404).json({ success: false, error: `No route for ${req.method} ${req.originalUrl}`, code: 'NotFound' });
    });
  }

  /**
   * Error handler - don't expose internal details in production
   */
  private setupErrorHandler(): void {
    this.app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }
      const status = clientErrorStatus(err);
      if (status !== undefined) {
        res.status(status).json({ success: false, error: getErrorMessage(err), code: 'BadRequest' });
        return;
      }
      console.error('[Server] Error:', err);
      const message = this.production ? 'Internal server error' : getErrorMessage(err);
      res.status(500).json({ success: false, error: message, code: 'Internal' });
    });
  }

  /**
   * The configured express app (tests mount it on an ephemeral port)
   */
  getApp(): express.Application {
    return this.app;
  }

  async start(): Promise<Server> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        console.log(`\n🧾 Suits Ledger API`);
        console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
        console.log(`Server running at http://localhost:${this.port}`);
        console.log(`Faucet: ${this.enableFaucet ? 'enabled' : 'disabled'}`);
        console.log(`\nAPI Endpoints:`);
        console.log(`  GET  /api/health            - Health check and ledger stats`);
        console.log(`  *    /api/profiles          - Usernames and profiles`);
        console.log(`  *    /api/suits             - Posts and the recent feed`);
        console.log(`  *    /api/interactions      - Likes, retweets, comments`);
        console.log(`  *    /api/tips              - Tip balances, tipping, withdrawals`);
        console.log(`  *    /api/wallets           - Native coin balances`);
        console.log(`  *    /api/chats             - Encrypted chats`);
        console.log(`  GET  /api/events[/stream]   - Event outbox and live updates`);
        console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━\n`);
        resolve(server);
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
