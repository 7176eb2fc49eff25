/**
 * Tipping Ledger Tests
 *
 * Every balance must satisfy balance == totalReceived - totalWithdrawn,
 * and coin moves between wallets and balances without being created or lost.
 */

import assert from 'node:assert/strict';
import { MIN_TIP } from '../../src/ledger/tipping.js';
import type { TipBalance } from '../../src/ledger-types.js';
import { ALICE, BOB, CAROL, UNKNOWN_ID, createLedger, expectLedgerError, objectId } from '../helpers.js';

function assertBalanceInvariant(balance: TipBalance | undefined): void {
  assert.ok(balance);
  assert.equal(balance.balance, balance.totalReceived - balance.totalWithdrawn);
}

function setup() {
  const ledger = createLedger();
  const suit = ledger.suits.createSuit(ALICE, 'tip jar');                        // id 1
  const aliceBalance = ledger.tipping.getOrCreateBalance(ALICE, ALICE);          // id 2
  const carolBalance = ledger.tipping.getOrCreateBalance(BOB, CAROL);            // id 3
  ledger.wallets.fund(BOB, BOB, 5_000_000);
  return { ledger, suit, aliceBalance, carolBalance };
}

async function testBalanceCreationIsIdempotent(): Promise<void> {
  const { ledger, aliceBalance, carolBalance } = setup();

  assert.equal(aliceBalance, objectId(2));
  assert.equal(carolBalance, objectId(3));
  assert.equal(ledger.tipping.getOrCreateBalance(BOB, ALICE), aliceBalance);
  assert.equal(ledger.tipping.getBalanceId(ALICE), aliceBalance);
  assert.equal(ledger.tipping.getBalanceId(BOB), undefined);

  assert.deepEqual(ledger.tipping.getBalance(carolBalance), {
    id: carolBalance,
    owner: CAROL,
    balance: 0,
    totalReceived: 0,
    totalWithdrawn: 0
  });

  const created = ledger.getEvents().filter(event => event.type === 'BalanceCreated');
  assert.equal(created.length, 2);
}

async function testTip(): Promise<void> {
  const { ledger, suit, aliceBalance } = setup();

  const after = ledger.tipping.tipSuit(BOB, suit.id, aliceBalance, MIN_TIP);

  assert.equal(MIN_TIP, 1_000_000);
  assert.equal(after.balance, 1_000_000);
  assert.equal(after.totalReceived, 1_000_000);
  assertBalanceInvariant(after);
  assert.equal(ledger.suits.getSuit(suit.id)?.tipTotal, 1_000_000);
  assert.equal(ledger.wallets.getBalance(BOB), 4_000_000);

  const tipEvent = ledger.getEvents().at(-1);
  assert.equal(tipEvent?.type, 'TipSent');
  if (tipEvent?.type === 'TipSent') {
    assert.equal(tipEvent.data.tipper, BOB);
    assert.equal(tipEvent.data.recipient, ALICE);
    assert.equal(tipEvent.data.amount, 1_000_000);
  }
}

async function testTipRejections(): Promise<void> {
  const { ledger, suit, aliceBalance, carolBalance } = setup();
  const eventsBefore = ledger.getEvents().length;

  expectLedgerError(() => ledger.tipping.tipSuit(BOB, suit.id, aliceBalance, MIN_TIP - 1), 'BelowMinimumTip');
  expectLedgerError(() => ledger.tipping.tipSuit(BOB, suit.id, aliceBalance, -5), 'InvalidAmount');
  expectLedgerError(() => ledger.tipping.tipSuit(BOB, suit.id, aliceBalance, 1_000_000.5), 'InvalidAmount');
  expectLedgerError(() => ledger.tipping.tipSuit(BOB, UNKNOWN_ID, aliceBalance, MIN_TIP), 'NotFound');
  expectLedgerError(() => ledger.tipping.tipSuit(BOB, suit.id, UNKNOWN_ID, MIN_TIP), 'NotFound');
  expectLedgerError(() => ledger.tipping.tipSuit(ALICE, suit.id, aliceBalance, MIN_TIP), 'SelfTip');
  expectLedgerError(() => ledger.tipping.tipSuit(BOB, suit.id, carolBalance, MIN_TIP), 'BalanceOwnerMismatch');
  // Carol's wallet was never funded
  expectLedgerError(() => ledger.tipping.tipSuit(CAROL, suit.id, aliceBalance, MIN_TIP), 'InsufficientFunds');
  expectLedgerError(() => ledger.tipping.tipSuit(BOB, suit.id, aliceBalance, 6_000_000), 'InsufficientFunds');

  assert.equal(ledger.tipping.getBalance(aliceBalance)?.balance, 0);
  assert.equal(ledger.suits.getSuit(suit.id)?.tipTotal, 0);
  assert.equal(ledger.wallets.getBalance(BOB), 5_000_000);
  assert.equal(ledger.getEvents().length, eventsBefore);
}

async function testWithdraw(): Promise<void> {
  const { ledger, suit, aliceBalance } = setup();
  ledger.tipping.tipSuit(BOB, suit.id, aliceBalance, 2_500_000);

  expectLedgerError(() => ledger.tipping.withdraw(BOB, aliceBalance, 100), 'NotOwner');
  expectLedgerError(() => ledger.tipping.withdraw(ALICE, aliceBalance, 0), 'InvalidAmount');
  expectLedgerError(() => ledger.tipping.withdraw(ALICE, aliceBalance, 2_500_001), 'InsufficientBalance');
  expectLedgerError(() => ledger.tipping.withdraw(ALICE, UNKNOWN_ID, 1), 'NotFound');

  const partial = ledger.tipping.withdraw(ALICE, aliceBalance, 400_000);
  assert.equal(partial.balance, 2_100_000);
  assert.equal(partial.totalWithdrawn, 400_000);
  assertBalanceInvariant(partial);
  assert.equal(ledger.wallets.getBalance(ALICE), 400_000);

  const drained = ledger.tipping.withdraw(ALICE, aliceBalance, 2_100_000);
  assert.equal(drained.balance, 0);
  assert.equal(drained.totalReceived, 2_500_000);
  assert.equal(drained.totalWithdrawn, 2_500_000);
  assert.equal(ledger.wallets.getBalance(ALICE), 2_500_000);

  expectLedgerError(() => ledger.tipping.withdraw(ALICE, aliceBalance, 1), 'ZeroBalance');

  // Conservation: the 5,000,000 minted for Bob is split between wallets
  assert.equal(ledger.wallets.getBalance(BOB) + ledger.wallets.getBalance(ALICE), 5_000_000);
}

async function testWithdrawChecksOwnerBeforeBalance(): Promise<void> {
  const { ledger, carolBalance } = setup();
  expectLedgerError(() => ledger.tipping.withdraw(BOB, carolBalance, 1), 'NotOwner');
  expectLedgerError(() => ledger.tipping.withdraw(CAROL, carolBalance, 1), 'ZeroBalance');
}

async function testTotalsStayWithinSafeIntegers(): Promise<void> {
  const MAX = Number.MAX_SAFE_INTEGER;
  const ledger = createLedger();
  const suit = ledger.suits.createSuit(ALICE, 'whale bait');             // id 1
  const balanceId = ledger.tipping.getOrCreateBalance(ALICE, ALICE);     // id 2

  ledger.wallets.fund(BOB, BOB, MAX);
  expectLedgerError(() => ledger.wallets.fund(BOB, BOB, 1), 'ArithmeticOverflow');
  assert.equal(ledger.wallets.getBalance(BOB), MAX);

  ledger.tipping.tipSuit(BOB, suit.id, balanceId, MAX);
  assert.equal(ledger.wallets.getBalance(BOB), 0);

  // A tip that would push the balance past the safe range is refused whole
  ledger.wallets.fund(CAROL, CAROL, MIN_TIP);
  expectLedgerError(() => ledger.tipping.tipSuit(CAROL, suit.id, balanceId, MIN_TIP), 'ArithmeticOverflow');
  assert.equal(ledger.wallets.getBalance(CAROL), MIN_TIP);
  assert.equal(ledger.tipping.getBalance(balanceId)?.balance, MAX);
  assert.equal(ledger.suits.getSuit(suit.id)?.tipTotal, MAX);

  // So is a withdrawal into a wallet that would overflow
  ledger.wallets.fund(ALICE, ALICE, 1);
  expectLedgerError(() => ledger.tipping.withdraw(ALICE, balanceId, MAX), 'ArithmeticOverflow');
  assert.equal(ledger.tipping.getBalance(balanceId)?.totalWithdrawn, 0);
  assertBalanceInvariant(ledger.tipping.getBalance(balanceId));

  const drained = ledger.tipping.withdraw(ALICE, balanceId, MAX - 1);
  assert.equal(drained.balance, 1);
  assertBalanceInvariant(drained);
  assert.equal(ledger.wallets.getBalance(ALICE), MAX);
}

async function testWalletFunding(): Promise<void> {
  const ledger = createLedger();
  assert.equal(ledger.wallets.getBalance(CAROL), 0);
  assert.equal(ledger.wallets.fund(ALICE, CAROL, 700), 700);
  assert.equal(ledger.wallets.fund(ALICE, CAROL, 300), 1_000);
  expectLedgerError(() => ledger.wallets.fund(ALICE, CAROL, 0), 'InvalidAmount');
  expectLedgerError(() => ledger.wallets.fund(ALICE, 'nobody', 5), 'InvalidAddress');
  assert.equal(ledger.getEvents().filter(event => event.type === 'WalletFunded').length, 2);
}

async function main(): Promise<void> {
  console.log('\n========================================');
  console.log('Tipping Ledger Tests');
  console.log('========================================\n');

  await testBalanceCreationIsIdempotent();
  console.log('✅ get_or_create_balance is idempotent');

  await testTip();
  console.log('✅ tip moves coin from wallet to balance and suit total');

  await testTipRejections();
  console.log('✅ tip rejections leave balances, suits and wallets unchanged');

  await testWithdraw();
  console.log('✅ withdraw keeps balance == received - withdrawn');

  await testWithdrawChecksOwnerBeforeBalance();
  console.log('✅ withdraw checks ownership before the balance');

  await testTotalsStayWithinSafeIntegers();
  console.log('✅ running totals never leave the safe-integer range');

  await testWalletFunding();
  console.log('✅ wallets are funded with positive amounts only');

  console.log('\n✅ ALL TIPPING LEDGER TESTS PASSED\n');
}

main().catch((error) => {
  console.error('❌ Tipping ledger tests failed:', error);
  process.exit(1);
});
