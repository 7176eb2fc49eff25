/**
 * Shared validation utilities for route handlers
 *
 * Request parsing, the caller lookup and the error -> response mapping
 * used by every route module.
 */

import type { Request, Response, NextFunction } from 'express';
import { Crypto } from '../../crypto.js';
import { isLedgerError, statusForCategory } from '../../errors.js';
import type { Address } from '../../ledger-types.js';

/**
 * Malformed request (missing field, wrong type). Always a 400.
 */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Read a field from a JSON body without trusting its shape
 */
export function bodyField(req: Request, field: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || !Object.hasOwn(body, field)) {
    return undefined;
  }
  return Object.getOwnPropertyDescriptor(body, field)?.value;
}

export function requireString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new BadRequestError(`${fieldName} is required and must be a string`);
  }
  return value;
}

export function optionalString(value: unknown, fieldName: string, defaultValue = ''): string {
  if (value === undefined || value === null) {
    return defaultValue;
  }
  return requireString(value, fieldName);
}

/**
 * Validate a hex-encoded 32-byte value (address or object ID)
 */
export function validateId(value: unknown, fieldName = 'id'): string {
  if (!value || typeof value !== 'string') {
    throw new BadRequestError(`${fieldName} is required`);
  }
  if (!Crypto.isHex32(value)) {
    throw new BadRequestError(`Invalid ${fieldName}: must be 64 lowercase hex characters (32 bytes)`);
  }
  return value;
}

/**
 * Decode a hex string of any even length into bytes
 */
export function validateHexBytes(value: unknown, fieldName: string): Uint8Array {
  if (typeof value !== 'string') {
    throw new BadRequestError(`${fieldName} is required and must be a hex string`);
  }
  if (value.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(value)) {
    throw new BadRequestError(`Invalid ${fieldName}: must be an even-length hex string`);
  }
  return Crypto.fromHex(value.toLowerCase());
}

/**
 * Validate an amount in minor units. Range rules are left to the ledger.
 */
export function validateAmount(value: unknown, fieldName = 'amount'): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new BadRequestError(`${fieldName} is required and must be a number`);
  }
  return value;
}

/**
 * Validate a positive integer from query/body parameter
 * @param defaultValue - Default if value is undefined/null
 */
export function validatePositiveInt(
  value: unknown,
  fieldName: string,
  defaultValue: number,
  max = Number.MAX_SAFE_INTEGER
): number {
  if (value === undefined || value === null || value === '') {
    return defaultValue;
  }

  const parsed = typeof value === 'number' ? value : parseInt(String(value), 10);

  if (isNaN(parsed) || parsed < 0) {
    throw new BadRequestError(`Invalid ${fieldName}: must be a positive integer`);
  }

  return Math.min(parsed, max);
}

/**
 * Authenticated caller, set by the signed-request middleware
 */
export function getCaller(res: Response): Address {
  const caller: unknown = res.locals.caller;
  if (typeof caller !== 'string') {
    throw new Error('Signed-request middleware did not run for this route');
  }
  return caller;
}

/**
 * Type guard to check if error has a message property
 */
export function isErrorWithMessage(error: unknown): error is { message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'message' in error &&
    typeof error.message === 'string'
  );
}

/**
 * Get error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return String(error);
}

/**
 * Standard error response helper
 *
 * Ledger errors map to a status by category; anything unexpected is a 500
 * whose message is hidden in production.
 */
export function sendErrorResponse(res: Response, error: unknown): void {
  if (isLedgerError(error)) {
    res.status(statusForCategory(error.category)).json({
      success: false,
      error: error.message,
      code: error.code
    });
    return;
  }

  if (error instanceof BadRequestError) {
    res.status(400).json({ success: false, error: error.message, code: 'BadRequest' });
    return;
  }

  console.error('[Server] Unhandled route error:', error);
  const message = process.env.NODE_ENV === 'production'
    ? 'Internal server error'
    : getErrorMessage(error);
  res.status(500).json({ success: false, error: message, code: 'Internal' });
}

/**
 * Route handler wrapper that turns thrown errors into error responses.
 * Ledger operations are synchronous, so handlers may be plain functions.
 */
export function routeHandler(
  handler: (req: Request, res: Response, next: NextFunction) => void | Promise<void>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    Promise.resolve()
      .then(() => handler(req, res, next))
      .catch((error: unknown) => {
        sendErrorResponse(res, error);
      });
  };
}
