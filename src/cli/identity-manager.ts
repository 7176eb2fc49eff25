/**
 * Identity management for CLI
 *
 * Local Ed25519 signing keys. The public key is the ledger address.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';
import { Crypto } from '../crypto.js';
import { getSuitsDataDir } from '../config.js';

export interface IdentityData {
  name: string;
  /** Ledger address (hex Ed25519 public key) */
  publicKey: string;
  secretKey: string;
  created: number;
}

export interface IdentityStore {
  version: string;
  identities: { [name: string]: IdentityData };
  defaultIdentity?: string;
}

function emptyStore(): IdentityStore {
  return { version: '1.0', identities: {} };
}

function isIdentityStore(value: unknown): value is IdentityStore {
  return typeof value === 'object'
    && value !== null
    && 'identities' in value
    && typeof value.identities === 'object'
    && value.identities !== null;
}

export class IdentityManager {
  private identityPath: string;
  private store: IdentityStore;

  constructor(customPath?: string) {
    this.identityPath = customPath || join(getSuitsDataDir(), 'identities.json');
    this.ensureIdentityDir();
    this.store = this.loadStore();
  }

  private ensureIdentityDir(): void {
    const dir = dirname(this.identityPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  private loadStore(): IdentityStore {
    if (!existsSync(this.identityPath)) {
      return emptyStore();
    }

    const parsed: unknown = JSON.parse(readFileSync(this.identityPath, 'utf-8'));
    if (!isIdentityStore(parsed)) {
      throw new Error(`Identity store at ${this.identityPath} is malformed`);
    }
    return parsed;
  }

  private saveStore(): void {
    const data = JSON.stringify(this.store, null, 2);
    writeFileSync(this.identityPath, data, { encoding: 'utf-8', mode: 0o600 });
  }

  /**
   * Create a new identity
   */
  createIdentity(name: string, setDefault = true): IdentityData {
    if (Object.hasOwn(this.store.identities, name)) {
      throw new Error(`Identity '${name}' already exists`);
    }

    const secret = Crypto.randomBytes(32);
    const identity: IdentityData = {
      name,
      publicKey: Crypto.toHex(Crypto.getPublicKey(secret)),
      secretKey: Crypto.toHex(secret),
      created: Date.now()
    };

    this.store.identities[name] = identity;

    if (setDefault || !this.store.defaultIdentity) {
      this.store.defaultIdentity = name;
    }

    this.saveStore();
    return identity;
  }

  /**
   * Get an identity by name, or the default one
   */
  getIdentity(name?: string): IdentityData {
    const identityName = name || this.store.defaultIdentity;

    if (!identityName) {
      throw new Error('No identity specified and no default identity set');
    }

    if (!Object.hasOwn(this.store.identities, identityName)) {
      throw new Error(`Identity '${identityName}' not found`);
    }

    return this.store.identities[identityName];
  }

  listIdentities(): IdentityData[] {
    return Object.values(this.store.identities);
  }

  getSecretKey(name?: string): Uint8Array {
    return Crypto.fromHex(this.getIdentity(name).secretKey);
  }

  getDefaultIdentityName(): string | undefined {
    return this.store.defaultIdentity;
  }
}
