/**
 * Sealed Message Tests
 */

import assert from 'node:assert/strict';
import { Crypto } from '../../src/crypto.js';
import { openMessage, sealMessage, verifyContentHash } from '../../src/client/sealed-message.js';

const recipientSecret = new Uint8Array(32).fill(7);
const recipientAddress = Crypto.toHex(Crypto.getPublicKey(recipientSecret));

async function testRoundTrip(): Promise<void> {
  const sealed = sealMessage('hello suits', recipientAddress);

  // ephemeral key (32) + nonce (24) + 11 bytes of text + tag (16)
  assert.equal(sealed.ciphertext.length, 83);
  assert.equal(Crypto.toHex(sealed.contentHash), Crypto.toHex(Crypto.hash('hello suits')));
  assert.equal(openMessage(sealed.ciphertext, recipientSecret), 'hello suits');
  assert.equal(verifyContentHash('hello suits', sealed.contentHash), true);
  assert.equal(verifyContentHash('hello suit', sealed.contentHash), false);
}

async function testFreshEphemeralKeys(): Promise<void> {
  const first = sealMessage('same text', recipientAddress);
  const second = sealMessage('same text', recipientAddress);

  assert.notEqual(Crypto.toHex(first.ciphertext), Crypto.toHex(second.ciphertext));
  assert.equal(Crypto.toHex(first.contentHash), Crypto.toHex(second.contentHash));
}

async function testRejections(): Promise<void> {
  const sealed = sealMessage('private', recipientAddress);

  const tampered = sealed.ciphertext.slice();
  tampered[tampered.length - 1] ^= 0xff;
  assert.throws(() => openMessage(tampered, recipientSecret));

  assert.throws(() => openMessage(sealed.ciphertext, new Uint8Array(32).fill(8)));
  assert.throws(() => openMessage(new Uint8Array(32), recipientSecret), /Sealed message is too short/);
}

async function main(): Promise<void> {
  console.log('\n========================================');
  console.log('Sealed Message Tests');
  console.log('========================================\n');

  await testRoundTrip();
  console.log('✅ seal/open round trip with content hash');

  await testFreshEphemeralKeys();
  console.log('✅ each seal uses a fresh ephemeral key');

  await testRejections();
  console.log('✅ tampered, misaddressed and truncated messages are rejected');

  console.log('\n✅ ALL SEALED MESSAGE TESTS PASSED\n');
}

main().catch((error) => {
  console.error('❌ Sealed message tests failed:', error);
  process.exit(1);
});
