// packages/staking-core/src/tests/claim.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';

import { bytesToHex } from '@epoch-stake/utils';

import { REWARD_ASSET, assertStakingError, makeHarness } from './fixtures.js';

function twoStakers() {
  const h = makeHarness();
  h.initPool();
  const alice = h.user(0x01);
  const bob = h.user(0x02);
  h.depositFrom(alice, 250n);
  h.depositFrom(bob, 750n);
  h.startEpoch(100n, 200n, 100n);
  h.transfer.calls.length = 0;
  h.log.lines.length = 0;
  return { h, alice, bob };
}

test('claim: pays each staker their share from reward custody', () => {
  const { h, alice, bob } = twoStakers();

  h.claimFor(alice);
  h.claimFor(bob);

  assert.deepEqual(h.transfer.calls, [
    { asset: bytesToHex(REWARD_ASSET), from: bytesToHex(h.rewardCustody.key), to: '01'.repeat(32), amount: 25n },
    { asset: bytesToHex(REWARD_ASSET), from: bytesToHex(h.rewardCustody.key), to: '02'.repeat(32), amount: 75n },
  ]);
  assert.deepEqual(h.log.lines, ['Claimed 25 rewards', 'Claimed 75 rewards']);
});

test('claim: staked amounts and pool totals do not change', () => {
  const { h, alice } = twoStakers();
  const before = h.readPool();

  h.claimFor(alice);

  const after = h.readPool();
  assert.equal(after.totalStaked, before.totalStaked);
  assert.equal(after.epochReward, before.epochReward);
  assert.equal(after.epochId, before.epochId);
  assert.equal(h.readPosition(alice).stakedAmount, 250n);
  assert.equal(h.readPosition(alice).lastClaimedEpoch, 1);
});

test('claim: a second claim in the same epoch is refused', () => {
  const { h, alice } = twoStakers();
  h.claimFor(alice);

  assertStakingError(() => h.claimFor(alice), 'StateError', 'AlreadyClaimed');
  assert.equal(h.transfer.calls.length, 1);
});

test('claim: a new epoch makes the position claimable again', () => {
  const { h, alice } = twoStakers();
  h.claimFor(alice);
  h.startEpoch(201n, 300n, 40n);

  h.claimFor(alice);

  assert.equal(h.transfer.calls.at(-1)?.amount, 10n);
  assert.equal(h.readPosition(alice).lastClaimedEpoch, 2);
});

test('claim: nothing to claim before the first epoch', () => {
  const h = makeHarness();
  h.initPool();
  const alice = h.user(0x01);
  h.depositFrom(alice, 10n);
  assertStakingError(() => h.claimFor(alice), 'ValidationError', 'NoActiveEpoch');
});

test('claim: position must exist', () => {
  const { h } = twoStakers();
  assertStakingError(() => h.claimFor(h.user(0x09)), 'StateError', 'Uninitialized');
});

test('claim: custody must be the pool reward custody', () => {
  const { h, alice } = twoStakers();
  assertStakingError(
    () => h.run([alice, h.stakeCustody, h.positionFor(alice)], { kind: 'claim' }),
    'StateError',
    'InvalidCustodyAccount'
  );
});

test('claim: participant must sign', () => {
  const { h } = twoStakers();
  assertStakingError(() => h.claimFor(h.user(0x01, false)), 'AuthorizationError', 'MissingSignature');
});

test('claim: a failed payout leaves the epoch unclaimed', () => {
  const { h, alice } = twoStakers();
  h.transfer.failWith = new Error('reward custody is empty');

  assertStakingError(() => h.claimFor(alice), 'TransferError', 'TransferFailed');
  assert.equal(h.readPosition(alice).lastClaimedEpoch, 0);

  h.transfer.failWith = null;
  h.claimFor(alice);
  assert.equal(h.readPosition(alice).lastClaimedEpoch, 1);
});

test('claim: a withdrawn-out position claims zero', () => {
  const { h, alice } = twoStakers();
  h.withdrawFrom(alice, 250n);
  h.transfer.calls.length = 0;

  h.claimFor(alice);

  assert.equal(h.transfer.calls[0]?.amount, 0n);
});

function rewardPayouts(h: ReturnType<typeof makeHarness>): bigint[] {
  const asset = bytesToHex(REWARD_ASSET);
  return h.transfer.calls.filter((c) => c.asset === asset).map((c) => c.amount);
}

function evenStakers() {
  const h = makeHarness();
  h.initPool();
  const alice = h.user(0x01);
  const bob = h.user(0x02);
  h.depositFrom(alice, 500n);
  h.depositFrom(bob, 500n);
  h.startEpoch(100n, 200n, 100n);
  h.transfer.calls.length = 0;
  return { h, alice, bob };
}

test('claim: stake moved into a fresh position mid-epoch earns nothing more', () => {
  const { h, alice, bob } = evenStakers();
  const carol = h.user(0x03);

  h.claimFor(alice);
  h.withdrawFrom(alice, 500n);
  h.depositFrom(carol, 500n);
  h.claimFor(carol);
  h.claimFor(bob);

  assert.deepEqual(rewardPayouts(h), [50n, 0n, 50n]);
  assert.equal(h.readPool().totalStaked, 1000n);
  assert.equal(h.readPosition(carol).lastClaimedEpoch, 1);
});

test('claim: a withdrawal by one staker does not enlarge the others share', () => {
  const { h, alice, bob } = evenStakers();

  h.withdrawFrom(alice, 500n);
  h.claimFor(bob);

  assert.deepEqual(rewardPayouts(h), [50n]);
});

test('claim: a top-up during the epoch counts from the next epoch', () => {
  const { h, alice } = twoStakers();

  h.depositFrom(alice, 750n);
  assert.equal(h.readPosition(alice).stakeAtEpochStart, 250n);
  assert.equal(h.readPosition(alice).lastDepositEpoch, 1);
  h.claimFor(alice);

  h.startEpoch(201n, 300n, 100n);
  assert.equal(h.readPool().epochTotalStaked, 1750n);
  h.claimFor(alice);

  // 250/1000 of 100, then 1000/1750 of 100
  assert.deepEqual(rewardPayouts(h), [25n, 57n]);
});
