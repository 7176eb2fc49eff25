/**
 * Interaction Ledger Tests
 *
 * Likes and retweets: one per (suit, user), owned markers, undo.
 * Comments: never deduplicated, counted on the suit.
 */

import assert from 'node:assert/strict';
import { interactionKey } from '../../src/ledger/keys.js';
import { ALICE, BOB, CAROL, START_TIME, UNKNOWN_ID, createLedger, expectLedgerError, objectId } from '../helpers.js';

async function testLikeLifecycle(): Promise<void> {
  const ledger = createLedger();
  const suit = ledger.suits.createSuit(ALICE, 'like me');          // id 1

  const like = ledger.interactions.likeSuit(BOB, suit.id);         // id 2
  assert.deepEqual(like, { id: objectId(2), suitId: suit.id, owner: BOB, createdAt: START_TIME });
  assert.equal(ledger.suits.getSuit(suit.id)?.likeCount, 1);
  assert.equal(ledger.interactions.hasLiked(suit.id, BOB), true);
  assert.equal(ledger.interactions.hasLiked(suit.id, CAROL), false);

  expectLedgerError(() => ledger.interactions.likeSuit(BOB, suit.id), 'AlreadyLiked');
  assert.equal(ledger.suits.getSuit(suit.id)?.likeCount, 1);

  ledger.interactions.unlikeSuit(BOB, like.id, suit.id);
  assert.equal(ledger.suits.getSuit(suit.id)?.likeCount, 0);
  assert.equal(ledger.interactions.hasLiked(suit.id, BOB), false);
  assert.equal(ledger.interactions.getLike(like.id), undefined);

  // Absent again: liking is allowed and mints a new marker
  const again = ledger.interactions.likeSuit(BOB, suit.id);        // id 3
  assert.equal(again.id, objectId(3));
  assert.equal(ledger.suits.getSuit(suit.id)?.likeCount, 1);

  const types = ledger.getEvents().map(event => event.type);
  assert.deepEqual(types, ['PostCreated', 'LikeCreated', 'LikeRemoved', 'LikeCreated']);
}

async function testLikeRejections(): Promise<void> {
  const ledger = createLedger();
  const first = ledger.suits.createSuit(ALICE, 'first');           // id 1
  const second = ledger.suits.createSuit(ALICE, 'second');         // id 2
  const like = ledger.interactions.likeSuit(BOB, first.id);        // id 3

  expectLedgerError(() => ledger.interactions.likeSuit(ALICE, first.id), 'CannotActOnOwnPost');
  expectLedgerError(() => ledger.interactions.likeSuit(BOB, UNKNOWN_ID), 'NotFound');

  expectLedgerError(() => ledger.interactions.unlikeSuit(CAROL, like.id, first.id), 'NotOwner');
  expectLedgerError(() => ledger.interactions.unlikeSuit(BOB, like.id, second.id), 'MismatchedPost');
  expectLedgerError(() => ledger.interactions.unlikeSuit(BOB, UNKNOWN_ID, first.id), 'NotFound');

  // Nothing above changed the like or the counters
  assert.equal(ledger.interactions.getLike(like.id)?.owner, BOB);
  assert.equal(ledger.suits.getSuit(first.id)?.likeCount, 1);
  assert.equal(ledger.suits.getSuit(second.id)?.likeCount, 0);
  assert.equal(ledger.getEvents().length, 3);
}

async function testRetweetsIndependentOfLikes(): Promise<void> {
  const ledger = createLedger();
  const suit = ledger.suits.createSuit(ALICE, 'share me');         // id 1
  ledger.interactions.likeSuit(BOB, suit.id);                      // id 2
  const retweet = ledger.interactions.retweetSuit(BOB, suit.id);   // id 3

  assert.equal(retweet.id, objectId(3));
  assert.equal(ledger.interactions.hasRetweeted(suit.id, BOB), true);
  assert.equal(ledger.suits.getSuit(suit.id)?.retweetCount, 1);
  expectLedgerError(() => ledger.interactions.retweetSuit(BOB, suit.id), 'AlreadyRetweeted');
  expectLedgerError(() => ledger.interactions.retweetSuit(ALICE, suit.id), 'CannotActOnOwnPost');

  // A like ID is not a retweet
  expectLedgerError(() => ledger.interactions.unretweetSuit(BOB, objectId(2), suit.id), 'NotFound');

  ledger.interactions.unretweetSuit(BOB, retweet.id, suit.id);
  assert.equal(ledger.interactions.hasRetweeted(suit.id, BOB), false);
  assert.equal(ledger.interactions.hasLiked(suit.id, BOB), true);
  assert.equal(ledger.suits.getSuit(suit.id)?.retweetCount, 0);
  assert.equal(ledger.suits.getSuit(suit.id)?.likeCount, 1);
}

async function testComments(): Promise<void> {
  const ledger = createLedger();
  const suit = ledger.suits.createSuit(ALICE, 'discuss');          // id 1

  const c1 = ledger.interactions.commentOnSuit(BOB, suit.id, 'first!');   // id 2
  ledger.interactions.commentOnSuit(BOB, suit.id, 'first!');              // id 3
  ledger.interactions.commentOnSuit(ALICE, suit.id, 'thanks');            // id 4

  assert.deepEqual(c1, { id: objectId(2), suitId: suit.id, owner: BOB, content: 'first!', createdAt: START_TIME });
  assert.equal(ledger.suits.getSuit(suit.id)?.commentCount, 3);
  assert.equal(ledger.interactions.getComment(objectId(4))?.owner, ALICE);

  expectLedgerError(() => ledger.interactions.commentOnSuit(BOB, suit.id, ''), 'EmptyComment');
  expectLedgerError(() => ledger.interactions.commentOnSuit(BOB, UNKNOWN_ID, 'hello?'), 'NotFound');
  assert.equal(ledger.suits.getSuit(suit.id)?.commentCount, 3);
  assert.equal(ledger.getEvents().length, 4);
}

async function testOwnedMarkers(): Promise<void> {
  const ledger = createLedger();
  const s1 = ledger.suits.createSuit(ALICE, 'one');                // id 1
  const s2 = ledger.suits.createSuit(CAROL, 'two');                // id 2
  ledger.interactions.likeSuit(BOB, s1.id);                        // id 3
  ledger.interactions.likeSuit(BOB, s2.id);                        // id 4
  ledger.interactions.likeSuit(ALICE, s2.id);                      // id 5
  ledger.interactions.retweetSuit(BOB, s2.id);                     // id 6

  assert.deepEqual(ledger.interactions.getOwnedLikes(BOB).map(like => like.id).sort(), [objectId(3), objectId(4)]);
  assert.deepEqual(ledger.interactions.getOwnedLikes(ALICE).map(like => like.suitId), [s2.id]);
  assert.deepEqual(ledger.interactions.getOwnedRetweets(BOB).map(retweet => retweet.id), [objectId(6)]);
  assert.deepEqual(ledger.interactions.getOwnedRetweets(CAROL), []);
}

async function testCompositeKeys(): Promise<void> {
  const key = interactionKey(objectId(1), BOB);
  assert.equal(key, objectId(1) + BOB);
  assert.notEqual(interactionKey(BOB, objectId(1)), key);
  assert.equal(key.length, 128);

  const ledger = createLedger();
  expectLedgerError(() => ledger.interactions.hasLiked(objectId(1), 'not-an-address'), 'InvalidAddress');
  expectLedgerError(() => interactionKey(objectId(1), BOB.toUpperCase()), 'InvalidAddress');
}

async function main(): Promise<void> {
  console.log('\n========================================');
  console.log('Interaction Ledger Tests');
  console.log('========================================\n');

  await testLikeLifecycle();
  console.log('✅ like -> unlike -> like cycles through absent/present');

  await testLikeRejections();
  console.log('✅ like/unlike rejections leave state unchanged');

  await testRetweetsIndependentOfLikes();
  console.log('✅ retweets are deduplicated separately from likes');

  await testComments();
  console.log('✅ comments are not deduplicated and are counted');

  await testOwnedMarkers();
  console.log('✅ owned likes and retweets are listed per address');

  await testCompositeKeys();
  console.log('✅ composite keys are fixed-width and validated');

  console.log('\n✅ ALL INTERACTION LEDGER TESTS PASSED\n');
}

main().catch((error) => {
  console.error('❌ Interaction ledger tests failed:', error);
  process.exit(1);
});
