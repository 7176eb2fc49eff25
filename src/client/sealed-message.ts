/**
 * Client-side sealing for chat messages
 *
 * The ledger only ever sees the output of sealMessage. Wire layout:
 *
 *   ciphertext  = ephemeralX25519Pub (32 bytes) || nonce || sealed box
 *   contentHash = SHA-256(plaintext)
 */

import { Crypto } from '../crypto.js';

const EPHEMERAL_KEY_LENGTH = 32;

export interface SealedMessage {
  ciphertext: Uint8Array;
  contentHash: Uint8Array;
}

/**
 * Encrypt a message for the holder of an Ed25519 address
 */
export function sealMessage(plaintext: string, recipientAddress: string): SealedMessage {
  const message = new TextEncoder().encode(plaintext);
  const recipientX25519 = Crypto.ed25519ToX25519(recipientAddress);
  const { ephemeralPublicKey, ciphertext } = Crypto.encrypt(message, recipientX25519);

  return {
    ciphertext: Crypto.concat(ephemeralPublicKey, ciphertext),
    contentHash: Crypto.hash(message)
  };
}

/**
 * Decrypt a sealed message with the recipient's Ed25519 secret key
 *
 * @throws Error if the ciphertext is truncated or fails authentication
 */
export function openMessage(ciphertext: Uint8Array, recipientSecretKey: Uint8Array): string {
  if (ciphertext.length <= EPHEMERAL_KEY_LENGTH) {
    throw new Error('Sealed message is too short');
  }
  const ephemeralPublicKey = ciphertext.slice(0, EPHEMERAL_KEY_LENGTH);
  const sealed = ciphertext.slice(EPHEMERAL_KEY_LENGTH);
  const x25519Secret = Crypto.ed25519PrivToX25519(recipientSecretKey);

  const plaintext = Crypto.decrypt(ephemeralPublicKey, sealed, x25519Secret);
  return new TextDecoder().decode(plaintext);
}

/**
 * True when the plaintext matches the hash stored beside the ciphertext
 */
export function verifyContentHash(plaintext: string, contentHash: Uint8Array): boolean {
  return Crypto.toHex(Crypto.hash(plaintext)) === Crypto.toHex(contentHash);
}
