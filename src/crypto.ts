/**
 * Cryptographic primitives for the Suits ledger
 */

import { sha256 } from '@noble/hashes/sha256';
import { hkdf } from '@noble/hashes/hkdf';
import { bytesToHex, hexToBytes, concatBytes } from '@noble/hashes/utils';
import { randomBytes } from 'crypto';
import { x25519, ed25519, edwardsToMontgomeryPub, edwardsToMontgomeryPriv } from '@noble/curves/ed25519';
import { xchacha20poly1305 } from '@noble/ciphers/chacha';
import { managedNonce } from '@noble/ciphers/webcrypto';

/**
 * Domain separation salt for HKDF key derivation
 */
const KDF_SALT_MESSAGE = new TextEncoder().encode('SUITS_MESSAGE_KEY_V1');

const HEX_32_BYTES = /^[0-9a-f]{64}$/;

export class Crypto {
  /**
   * Generate cryptographically secure random bytes
   */
  static randomBytes(length: number): Uint8Array {
    return randomBytes(length);
  }

  /**
   * Hash arbitrary data with SHA-256
   */
  static hash(...inputs: (Uint8Array | string | number)[]): Uint8Array {
    const combined = inputs.map(input => {
      if (typeof input === 'string') {
        return new TextEncoder().encode(input);
      } else if (typeof input === 'number') {
        const buf = new ArrayBuffer(8);
        const view = new DataView(buf);
        view.setBigUint64(0, BigInt(input), false);
        return new Uint8Array(buf);
      }
      return input;
    });

    return sha256(concatBytes(...combined));
  }

  static toHex(bytes: Uint8Array): string {
    return bytesToHex(bytes);
  }

  static fromHex(hex: string): Uint8Array {
    return hexToBytes(hex);
  }

  static concat(...parts: Uint8Array[]): Uint8Array {
    return concatBytes(...parts);
  }

  /**
   * True for 64 lowercase hex characters (addresses and object IDs)
   */
  static isHex32(value: unknown): value is string {
    return typeof value === 'string' && HEX_32_BYTES.test(value);
  }

  /**
   * Hash a string and return hex string
   */
  static hashString(input: string): string {
    return this.toHex(this.hash(input));
  }

  /**
   * Deterministic JSON stringify with sorted keys
   *
   * JSON.stringify() keeps insertion order, so two clients serializing the
   * same body can disagree. Signed request bodies are hashed through this.
   */
  static stableStringify(obj: unknown): string {
    if (obj === null || obj === undefined) {
      return 'null';
    }

    if (typeof obj !== 'object') {
      return JSON.stringify(obj);
    }

    if (Array.isArray(obj)) {
      const items = obj.map(item => this.stableStringify(item));
      return '[' + items.join(',') + ']';
    }

    const entries: [string, unknown][] = Object.entries(obj);
    const pairs = entries
      .filter(([, value]) => value !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => JSON.stringify(key) + ':' + this.stableStringify(value));

    return '{' + pairs.join(',') + '}';
  }

  /**
   * Hash an object deterministically (hex)
   */
  static hashObject(obj: unknown): string {
    return this.hashString(this.stableStringify(obj));
  }

  /**
   * Derive a key using HKDF-SHA256
   */
  static deriveKey(
    ikm: Uint8Array,
    salt: Uint8Array,
    info: Uint8Array | string,
    length: number = 32
  ): Uint8Array {
    const infoBytes = typeof info === 'string'
      ? new TextEncoder().encode(info)
      : info;

    return hkdf(sha256, ikm, salt, infoBytes, length);
  }

  // =================================================================
  //  SIGNING
  // =================================================================

  static sign(message: Uint8Array, privateKey: Uint8Array): Uint8Array {
    return ed25519.sign(message, privateKey);
  }

  /**
   * Verify an Ed25519 signature. Malformed keys or signatures verify false.
   */
  static verify(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean {
    try {
      return ed25519.verify(signature, message, publicKey);
    } catch {
      return false;
    }
  }

  static getPublicKey(privateKey: Uint8Array): Uint8Array {
    return ed25519.getPublicKey(privateKey);
  }

  /**
   * Convert an Ed25519 public key to its X25519 counterpart.
   *
   * Pairs with ed25519PrivToX25519, which converts the seed to the matching
   * X25519 scalar.
   */
  static ed25519ToX25519(ed25519PublicKey: Uint8Array | string): Uint8Array {
    const pubBytes = typeof ed25519PublicKey === 'string'
      ? this.fromHex(ed25519PublicKey)
      : ed25519PublicKey;
    return edwardsToMontgomeryPub(pubBytes);
  }

  static ed25519PrivToX25519(ed25519PrivateKey: Uint8Array): Uint8Array {
    return edwardsToMontgomeryPriv(ed25519PrivateKey);
  }

  // =================================================================
  //  ENCRYPTION
  // =================================================================

  /**
   * Encrypt a message for an X25519 public key.
   * X25519 ephemeral exchange, HKDF, then XChaCha20-Poly1305.
   */
  static encrypt(message: Uint8Array, recipientPublicKey: Uint8Array): {
    ephemeralPublicKey: Uint8Array;
    ciphertext: Uint8Array;
  } {
    const ephemeralSecret = this.randomBytes(32);
    const ephemeralPublic = x25519.getPublicKey(ephemeralSecret);
    const sharedSecret = x25519.getSharedSecret(ephemeralSecret, recipientPublicKey);

    // Info binds the key to both public keys of this exchange
    const info = concatBytes(ephemeralPublic, recipientPublicKey);
    const encryptionKey = this.deriveKey(sharedSecret, KDF_SALT_MESSAGE, info, 32);

    const cipher = managedNonce(xchacha20poly1305)(encryptionKey);
    return {
      ephemeralPublicKey: ephemeralPublic,
      ciphertext: cipher.encrypt(message)
    };
  }

  /**
   * Decrypt a message with our X25519 secret key
   *
   * @throws Error if authentication fails
   */
  static decrypt(
    ephemeralPublicKey: Uint8Array,
    ciphertext: Uint8Array,
    secretKey: Uint8Array,
    ourPublicKey?: Uint8Array
  ): Uint8Array {
    const sharedSecret = x25519.getSharedSecret(secretKey, ephemeralPublicKey);
    const recipientPublic = ourPublicKey ?? x25519.getPublicKey(secretKey);
    const info = concatBytes(ephemeralPublicKey, recipientPublic);
    const encryptionKey = this.deriveKey(sharedSecret, KDF_SALT_MESSAGE, info, 32);

    const cipher = managedNonce(xchacha20poly1305)(encryptionKey);
    return cipher.decrypt(ciphertext);
  }
}
