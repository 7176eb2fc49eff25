/**
 * Runtime configuration, read from the environment in one place
 */

import { join } from 'path';
import { homedir } from 'os';

export const DEFAULT_PORT = 3000;
export const DEFAULT_SIGNATURE_WINDOW_MS = 5 * 60 * 1000;

export interface SuitsEnvConfig {
  dataDir: string;
  port: number;
  production: boolean;
  /** Extra CORS origins; empty means localhost only */
  allowedOrigins: string[];
  trustProxy: boolean;
  enableFaucet: boolean;
  signatureWindowMs: number;
}

/**
 * Get Suits data directory from environment or default
 */
export function getSuitsDataDir(): string {
  return process.env.SUITS_DATA_DIR || join(homedir(), '.suits');
}

function parseInteger(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SuitsEnvConfig {
  return {
    dataDir: env.SUITS_DATA_DIR || join(homedir(), '.suits'),
    port: parseInteger(env.PORT, DEFAULT_PORT, 'PORT'),
    production: env.NODE_ENV === 'production',
    allowedOrigins: (env.ALLOWED_ORIGINS ?? '')
      .split(',')
      .map(origin => origin.trim())
      .filter(origin => origin.length > 0),
    trustProxy: env.TRUST_PROXY === 'true',
    enableFaucet: env.SUITS_ENABLE_FAUCET === 'true',
    signatureWindowMs: parseInteger(env.SUITS_SIGNATURE_WINDOW_MS, DEFAULT_SIGNATURE_WINDOW_MS, 'SUITS_SIGNATURE_WINDOW_MS')
  };
}
