/**
 * Social Flow Integration Test
 *
 * Tests:
 * 1. Profiles for two real Ed25519 identities
 * 2. A suit with likes, a retweet and comments
 * 3. A tip that moves coin from wallet to creator balance and back out
 * 4. An encrypted chat readable only by its recipient
 * 5. A dense, ordered event outbox covering all of the above
 */

import assert from 'node:assert/strict';
import { Crypto } from '../../src/crypto.js';
import { MIN_TIP } from '../../src/ledger/tipping.js';
import { openMessage, sealMessage, verifyContentHash } from '../../src/client/sealed-message.js';
import { createLedger } from '../helpers.js';

function identity(fill: number) {
  const secretKey = new Uint8Array(32).fill(fill);
  return { secretKey, address: Crypto.toHex(Crypto.getPublicKey(secretKey)) };
}

async function testSocialFlow(): Promise<void> {
  const alice = identity(1);
  const bob = identity(2);
  const ledger = createLedger();

  // 1. Profiles
  ledger.profiles.createProfile(alice.address, { username: 'alice', bio: 'writes suits', avatarUrl: '' });
  ledger.profiles.createProfile(bob.address, { username: 'bob', bio: '', avatarUrl: '' });
  assert.equal(ledger.profiles.getOwnerByUsername('bob'), bob.address);

  // 2. Suit and interactions
  const suit = ledger.suits.createSuit(alice.address, 'hello from the ledger');
  const like = ledger.interactions.likeSuit(bob.address, suit.id);
  ledger.interactions.retweetSuit(bob.address, suit.id);
  const comment = ledger.interactions.commentOnSuit(bob.address, suit.id, 'nice');
  ledger.interactions.commentOnSuit(alice.address, suit.id, 'thanks bob');

  let current = ledger.suits.getSuit(suit.id);
  assert.equal(current?.likeCount, 1);
  assert.equal(current?.retweetCount, 1);
  assert.equal(current?.commentCount, 2);
  assert.equal(ledger.indexer?.getCommentIds(suit.id)[0], comment.id);

  ledger.interactions.unlikeSuit(bob.address, like.id, suit.id);
  assert.equal(ledger.suits.getSuit(suit.id)?.likeCount, 0);

  // 3. Tipping
  ledger.wallets.fund(bob.address, bob.address, 3 * MIN_TIP);
  const balanceId = ledger.tipping.getOrCreateBalance(bob.address, alice.address);
  ledger.tipping.tipSuit(bob.address, suit.id, balanceId, 2 * MIN_TIP);
  current = ledger.suits.getSuit(suit.id);
  assert.equal(current?.tipTotal, 2 * MIN_TIP);

  const withdrawn = ledger.tipping.withdraw(alice.address, balanceId, MIN_TIP);
  assert.equal(withdrawn.balance, MIN_TIP);
  assert.equal(ledger.wallets.getBalance(alice.address), MIN_TIP);
  assert.equal(ledger.wallets.getBalance(bob.address), MIN_TIP);

  // 4. Encrypted chat
  const chatId = ledger.messaging.startChat(alice.address, bob.address);
  const sealed = sealMessage('meet at noon', bob.address);
  const index = ledger.messaging.sendMessage(alice.address, chatId, sealed.ciphertext, sealed.contentHash);

  const [stored] = ledger.messaging.getMessages(chatId);
  const plaintext = openMessage(stored.ciphertext, bob.secretKey);
  assert.equal(plaintext, 'meet at noon');
  assert.equal(verifyContentHash(plaintext, stored.contentHash), true);
  assert.throws(() => openMessage(stored.ciphertext, alice.secretKey));

  assert.equal(ledger.indexer?.getNotifications(bob.address, true).length, 1);
  ledger.messaging.markAsRead(bob.address, chatId, index);
  assert.equal(ledger.indexer?.getNotifications(bob.address, true).length, 0);
  assert.equal(ledger.messaging.getUnreadCount(chatId, bob.address), 0);

  // 5. Outbox
  const events = ledger.getEvents(-1, 1000);
  assert.deepEqual(events.map(event => event.seq), events.map((_, i) => i));
  assert.deepEqual(events.map(event => event.type), [
    'ProfileCreated',
    'ProfileCreated',
    'PostCreated',
    'LikeCreated',
    'RetweetCreated',
    'CommentCreated',
    'CommentCreated',
    'LikeRemoved',
    'WalletFunded',
    'BalanceCreated',
    'TipSent',
    'FundsWithdrawn',
    'ChatCreated',
    'MessageSent',
    'MessageRead'
  ]);
  assert.deepEqual(ledger.getStats(), { profiles: 2, suits: 1, chats: 1, events: 15 });
  ledger.close();
}

async function main(): Promise<void> {
  console.log('\n========================================');
  console.log('Social Flow Integration Test');
  console.log('========================================\n');

  await testSocialFlow();
  console.log('✅ profiles, suits, interactions, tips and chats in one ledger');

  console.log('\n✅ SOCIAL FLOW INTEGRATION TEST PASSED\n');
}

main().catch((error) => {
  console.error('❌ Social flow integration test failed:', error);
  process.exit(1);
});
