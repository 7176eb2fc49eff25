/**
 * Event Indexer Tests
 *
 * Comment lists and message inboxes rebuilt from the outbox.
 */

import assert from 'node:assert/strict';
import { EventIndexer } from '../../src/indexer/event-indexer.js';
import { ALICE, BOB, CAROL, START_TIME, createLedger, objectId } from '../helpers.js';

const bytes = (...values: number[]) => new Uint8Array(values);

function seedLedger() {
  const ledger = createLedger(undefined, { enableIndexer: false });
  const suit = ledger.suits.createSuit(ALICE, 'indexed');                  // id 1, seq 0
  ledger.interactions.commentOnSuit(BOB, suit.id, 'one');                  // id 2, seq 1
  ledger.interactions.commentOnSuit(CAROL, suit.id, 'two');                // id 3, seq 2
  const chatId = ledger.messaging.startChat(ALICE, BOB);                   // id 4, seq 3
  ledger.messaging.sendMessage(ALICE, chatId, bytes(1), bytes(1));         // seq 4
  ledger.messaging.sendMessage(ALICE, chatId, bytes(2), bytes(2));         // seq 5
  return { ledger, suitId: suit.id, chatId };
}

async function testReplayOnStart(): Promise<void> {
  const { ledger, suitId, chatId } = seedLedger();
  assert.equal(ledger.indexer, undefined);

  const indexer = new EventIndexer({ state: ledger.state, replayPageSize: 2 });
  assert.equal(indexer.getLastSeq(), -1);
  indexer.start();

  assert.equal(indexer.getLastSeq(), 5);
  assert.deepEqual(indexer.getCommentIds(suitId), [objectId(2), objectId(3)]);
  assert.deepEqual(indexer.getNotifications(BOB), [
    { chatId, sender: ALICE, index: 0, sentAt: START_TIME, read: false },
    { chatId, sender: ALICE, index: 1, sentAt: START_TIME, read: false }
  ]);
  assert.deepEqual(indexer.getNotifications(ALICE), []);
  assert.deepEqual(indexer.getCommentIds(objectId(99)), []);
  indexer.stop();
}

async function testFollowsLiveEvents(): Promise<void> {
  const { ledger, suitId, chatId } = seedLedger();
  const indexer = new EventIndexer({ state: ledger.state });
  indexer.start();

  ledger.interactions.commentOnSuit(ALICE, suitId, 'three');              // id 5, seq 6
  ledger.messaging.markAsRead(BOB, chatId, 0);                            // seq 7

  assert.equal(indexer.getLastSeq(), 7);
  assert.deepEqual(indexer.getCommentIds(suitId), [objectId(2), objectId(3), objectId(5)]);
  assert.deepEqual(indexer.getNotifications(BOB).map(entry => entry.read), [true, false]);
  assert.deepEqual(indexer.getNotifications(BOB, true).map(entry => entry.index), [1]);

  // Returned lists are copies
  indexer.getCommentIds(suitId).push('tampered');
  const [first] = indexer.getNotifications(BOB, true);
  first.read = true;
  assert.equal(indexer.getCommentIds(suitId).length, 3);
  assert.equal(indexer.getNotifications(BOB, true).length, 1);
  indexer.stop();
}

async function testStopAndResume(): Promise<void> {
  const { ledger, suitId } = seedLedger();
  const indexer = new EventIndexer({ state: ledger.state });
  indexer.start();
  indexer.stop();

  ledger.interactions.commentOnSuit(BOB, suitId, 'while stopped');        // id 5, seq 6
  assert.equal(indexer.getLastSeq(), 5);
  assert.equal(indexer.getCommentIds(suitId).length, 2);

  // Resuming catches up from the last applied seq without duplicates
  indexer.start();
  assert.equal(indexer.getLastSeq(), 6);
  assert.deepEqual(indexer.getCommentIds(suitId), [objectId(2), objectId(3), objectId(5)]);
  indexer.stop();
}

async function testLedgerOwnedIndexer(): Promise<void> {
  const ledger = createLedger();
  const suit = ledger.suits.createSuit(ALICE, 'default indexer');
  ledger.interactions.commentOnSuit(BOB, suit.id, 'hello');

  assert.ok(ledger.indexer);
  assert.deepEqual(ledger.indexer.getCommentIds(suit.id), [objectId(2)]);
  ledger.close();
  ledger.interactions.commentOnSuit(BOB, suit.id, 'after close');
  assert.deepEqual(ledger.indexer.getCommentIds(suit.id), [objectId(2)]);
}

async function main(): Promise<void> {
  console.log('\n========================================');
  console.log('Event Indexer Tests');
  console.log('========================================\n');

  await testReplayOnStart();
  console.log('✅ indexer replays the outbox in pages on start');

  await testFollowsLiveEvents();
  console.log('✅ indexer follows comments and read receipts live');

  await testStopAndResume();
  console.log('✅ stop detaches, start resumes without duplicates');

  await testLedgerOwnedIndexer();
  console.log('✅ ledger builds its own indexer by default');

  console.log('\n✅ ALL EVENT INDEXER TESTS PASSED\n');
}

main().catch((error) => {
  console.error('❌ Event indexer tests failed:', error);
  process.exit(1);
});
