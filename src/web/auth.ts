/**
 * Web API Authentication
 *
 * Mutating requests are signed with the caller's Ed25519 key. The signed
 * message binds the method, path, timestamp and body hash:
 *
 *   suits:<METHOD>:<path>:<timestamp>:<sha256(stableStringify(body))>
 *
 * Signatures outside the freshness window, and signatures already seen,
 * are rejected. The verified address becomes the transaction sender.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { Crypto } from '../crypto.js';
import type { Address } from '../ledger-types.js';

export const ADDRESS_HEADER = 'x-suits-address';
export const TIMESTAMP_HEADER = 'x-suits-timestamp';
export const SIGNATURE_HEADER = 'x-suits-signature';

export interface SignedRequestConfig {
  /** Accepted clock skew either side of now (default: 5 minutes) */
  windowMs?: number;
  /** Clock used for freshness checks (default: Date.now) */
  now?: () => number;
}

export interface SignedHeaders {
  'X-Suits-Address': string;
  'X-Suits-Timestamp': string;
  'X-Suits-Signature': string;
}

/**
 * Bytes a client signs for one request
 */
export function signingPayload(method: string, path: string, timestamp: number, body: unknown): Uint8Array {
  const bodyHash = Crypto.hashObject(body ?? {});
  return new TextEncoder().encode(`suits:${method.toUpperCase()}:${path}:${timestamp}:${bodyHash}`);
}

/**
 * Produce the auth headers for a request (client side)
 */
export function signRequest(
  secretKey: Uint8Array,
  method: string,
  path: string,
  body: unknown,
  timestamp: number = Date.now()
): SignedHeaders {
  const publicKey = Crypto.getPublicKey(secretKey);
  const signature = Crypto.sign(signingPayload(method, path, timestamp, body), secretKey);
  return {
    'X-Suits-Address': Crypto.toHex(publicKey),
    'X-Suits-Timestamp': String(timestamp),
    'X-Suits-Signature': Crypto.toHex(signature)
  };
}

function header(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === 'string' ? value : undefined;
}

export class SignatureVerifier {
  private readonly windowMs: number;
  private readonly now: () => number;
  /** Signature hex -> time after which it can no longer be replayed anyway */
  private readonly seen = new Map<string, number>();

  constructor(config: SignedRequestConfig = {}) {
    this.windowMs = config.windowMs ?? 5 * 60 * 1000;
    this.now = config.now ?? Date.now;
  }

  /**
   * Verify the request's signature headers
   *
   * @returns The caller's address, or an error message
   */
  verify(req: Request): { address: Address } | { error: string } {
    const address = header(req, ADDRESS_HEADER);
    const timestampRaw = header(req, TIMESTAMP_HEADER);
    const signatureHex = header(req, SIGNATURE_HEADER);

    if (!address || !timestampRaw || !signatureHex) {
      return { error: 'Signed request required' };
    }
    if (!Crypto.isHex32(address)) {
      return { error: 'Invalid signer address' };
    }
    if (!/^[0-9a-f]{128}$/.test(signatureHex)) {
      return { error: 'Invalid signature encoding' };
    }

    const timestamp = Number(timestampRaw);
    const now = this.now();
    if (!Number.isSafeInteger(timestamp) || Math.abs(now - timestamp) > this.windowMs) {
      return { error: 'Request timestamp outside the accepted window' };
    }

    this.prune(now);
    if (this.seen.has(signatureHex)) {
      return { error: 'Replayed request' };
    }

    const path = req.originalUrl.split('?')[0];
    const payload = signingPayload(req.method, path, timestamp, req.body);
    if (!Crypto.verify(payload, Crypto.fromHex(signatureHex), Crypto.fromHex(address))) {
      return { error: 'Invalid signature' };
    }

    this.seen.set(signatureHex, timestamp + this.windowMs);
    return { address };
  }

  /**
   * Express middleware: 401 unless the request carries a valid signature
   */
  createMiddleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
      const result = this.verify(req);
      if ('error' in result) {
        console.warn(`[Auth] Rejected ${req.method} ${req.originalUrl}: ${result.error}`);
        res.status(401).json({ success: false, error: result.error, code: 'Unauthenticated' });
        return;
      }
      res.locals.caller = result.address;
      next();
    };
  }

  private prune(now: number): void {
    for (const [signature, expiresAt] of this.seen) {
      if (expiresAt < now) {
        this.seen.delete(signature);
      }
    }
  }
}
