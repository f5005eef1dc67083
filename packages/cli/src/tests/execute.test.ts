// packages/cli/src/tests/execute.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';

import { FileBackedAccountStore, getAccount, getBalance } from '@epoch-stake/account-store';
import { encodeInstruction } from '@epoch-stake/staking-core';
import { bytesToHex } from '@epoch-stake/utils';

import { executeTransaction } from '../host/execute.js';
import { signTransaction } from '../host/transaction.js';
import { mint, hostTransfer } from '../host/faucet.js';
import { readEvents } from '../host/events.js';
import { makePoolOpContext, positionAddressOf, type PoolOpContext } from '../pool/context.js';
import { runInit } from '../pool/ops/init.js';
import { runDeposit } from '../pool/ops/deposit.js';
import { runWithdraw } from '../pool/ops/withdraw.js';
import { runStartEpoch } from '../pool/ops/epoch.js';
import { runClaim } from '../pool/ops/claim.js';
import { readPool, readPosition } from '../pool/state.js';
import { ALICE, BOB, CAROL, DEPLOYMENT, OWNER, b32, makeMemoryCtx, rejectsWithCode, tmpDir } from './helpers.js';

const { stakeAsset, rewardAsset, programId } = DEPLOYMENT;

test('host: init allocates pool and custody accounts and records the owner', async () => {
  const { ctx, store } = makeMemoryCtx();

  const receipt = await runInit(ctx, { owner: OWNER });

  assert.deepEqual(receipt.logs, [`Initialized staking pool with owner ${bytesToHex(OWNER.identity)}`]);
  assert.deepEqual(receipt.signers, [bytesToHex(OWNER.identity)]);

  const pool = readPool(ctx);
  assert.ok(pool);
  assert.equal(pool.initialized, true);
  assert.deepEqual(pool.owner, OWNER.identity);
  assert.deepEqual(pool.stakeAsset, stakeAsset);

  for (const key of [ctx.addresses.stakeCustody, ctx.addresses.rewardCustody]) {
    const acc = getAccount(store, key);
    assert.ok(acc);
    assert.deepEqual(acc.owner, programId);
  }
  assert.equal(getAccount(store, OWNER.identity), null);
  assert.equal(store.flushCount, 1);
});

test('host: full epoch cycle moves balances through custody', async () => {
  const { ctx, store } = makeMemoryCtx();
  await runInit(ctx, { owner: OWNER });

  await mint(ctx, { asset: stakeAsset, to: ALICE.identity, amount: 1_000n });
  await mint(ctx, { asset: stakeAsset, to: BOB.identity, amount: 1_000n });
  await mint(ctx, { asset: rewardAsset, to: OWNER.identity, amount: 100n });
  await hostTransfer(ctx, { asset: rewardAsset, from: OWNER, to: ctx.addresses.rewardCustody, amount: 100n });

  await runDeposit(ctx, { participant: ALICE, amount: 250n });
  await runDeposit(ctx, { participant: BOB, amount: 750n });

  assert.equal(getBalance(store, stakeAsset, ALICE.identity), 750n);
  assert.equal(getBalance(store, stakeAsset, ctx.addresses.stakeCustody), 1_000n);
  assert.equal(readPool(ctx)?.totalStaked, 1_000n);

  await runStartEpoch(ctx, { owner: OWNER, startTime: 10n, endTime: 20n, rewardAmount: 100n });
  assert.equal(readPosition(ctx, ALICE.identity).claimable, 25n);

  const claimed = await runClaim(ctx, { participant: ALICE });
  assert.deepEqual(claimed.logs, ['Claimed 25 rewards']);
  await runClaim(ctx, { participant: BOB });

  assert.equal(getBalance(store, rewardAsset, ALICE.identity), 25n);
  assert.equal(getBalance(store, rewardAsset, BOB.identity), 75n);
  assert.equal(getBalance(store, rewardAsset, ctx.addresses.rewardCustody), 0n);
  assert.equal(readPosition(ctx, ALICE.identity).claimable, 0n);

  await runWithdraw(ctx, { participant: ALICE, amount: 250n });
  assert.equal(getBalance(store, stakeAsset, ALICE.identity), 1_000n);
  assert.equal(readPool(ctx)?.totalStaked, 750n);
  assert.equal(readPosition(ctx, ALICE.identity).position?.stakedAmount, 0n);
});

test('host: stake recycled through another wallet mid-epoch cannot drain reward custody', async () => {
  const { ctx, store } = makeMemoryCtx();
  await runInit(ctx, { owner: OWNER });
  await mint(ctx, { asset: stakeAsset, to: ALICE.identity, amount: 500n });
  await mint(ctx, { asset: stakeAsset, to: BOB.identity, amount: 500n });
  await mint(ctx, { asset: rewardAsset, to: OWNER.identity, amount: 100n });
  await hostTransfer(ctx, { asset: rewardAsset, from: OWNER, to: ctx.addresses.rewardCustody, amount: 100n });
  await runDeposit(ctx, { participant: ALICE, amount: 500n });
  await runDeposit(ctx, { participant: BOB, amount: 500n });
  await runStartEpoch(ctx, { owner: OWNER, startTime: 10n, endTime: 20n, rewardAmount: 100n });

  await runClaim(ctx, { participant: ALICE });
  await runWithdraw(ctx, { participant: ALICE, amount: 500n });
  await hostTransfer(ctx, { asset: stakeAsset, from: ALICE, to: CAROL.identity, amount: 500n });
  await runDeposit(ctx, { participant: CAROL, amount: 500n });
  const carol = await runClaim(ctx, { participant: CAROL });
  const bob = await runClaim(ctx, { participant: BOB });

  assert.deepEqual(carol.logs, ['Claimed 0 rewards']);
  assert.deepEqual(bob.logs, ['Claimed 50 rewards']);
  assert.equal(getBalance(store, rewardAsset, ALICE.identity), 50n);
  assert.equal(getBalance(store, rewardAsset, CAROL.identity), 0n);
  assert.equal(getBalance(store, rewardAsset, BOB.identity), 50n);
  assert.equal(getBalance(store, rewardAsset, ctx.addresses.rewardCustody), 0n);
});

test('host: a failing transaction commits nothing', async () => {
  const { ctx, store } = makeMemoryCtx();
  await runInit(ctx, { owner: OWNER });
  await mint(ctx, { asset: stakeAsset, to: ALICE.identity, amount: 100n });
  const flushes = store.flushCount;
  const before = store.snapshot();

  // more than the wallet holds: the ledger refuses inside the program call
  await rejectsWithCode(() => runDeposit(ctx, { participant: ALICE, amount: 101n }), 'TransferFailed');

  assert.deepEqual(store.snapshot(), before);
  assert.equal(store.flushCount, flushes);
  assert.equal(getAccount(store, positionAddressOf(ctx, ALICE.identity)), null);
});

test('host: unsigned and tampered transactions are refused', async () => {
  const { ctx } = makeMemoryCtx();
  await runInit(ctx, { owner: OWNER });

  const unsigned = {
    programId,
    accountKeys: [ctx.addresses.pool, OWNER.identity],
    instruction: encodeInstruction({ kind: 'startEpoch', startTime: 1n, endTime: 2n, rewardAmount: 3n }),
  };

  await rejectsWithCode(
    () => executeTransaction(ctx, { ...unsigned, signatures: [] }, { op: 'startEpoch' }),
    'MissingSignature'
  );

  const signed = signTransaction(unsigned, [OWNER]);
  const tampered = { ...signed, instruction: encodeInstruction({ kind: 'startEpoch', startTime: 1n, endTime: 2n, rewardAmount: 999n }) };
  await rejectsWithCode(() => executeTransaction(ctx, tampered, { op: 'startEpoch' }), 'MissingSignature');

  assert.equal(readPool(ctx)?.epochId, 0);
});

test("host: a participant cannot act on someone else's position", async () => {
  const { ctx } = makeMemoryCtx();
  await runInit(ctx, { owner: OWNER });
  await mint(ctx, { asset: stakeAsset, to: ALICE.identity, amount: 100n });
  await runDeposit(ctx, { participant: ALICE, amount: 100n });

  const tx = signTransaction(
    {
      programId,
      accountKeys: [ctx.addresses.pool, BOB.identity, ctx.addresses.stakeCustody, positionAddressOf(ctx, ALICE.identity)],
      instruction: encodeInstruction({ kind: 'withdraw', amount: 100n }),
    },
    [BOB]
  );

  await rejectsWithCode(() => executeTransaction(ctx, tx, { op: 'withdraw' }), 'InvalidPositionAccount');
});

test('host: transactions for another program are refused', async () => {
  const { ctx } = makeMemoryCtx();
  const tx = signTransaction(
    { programId: b32(0xee), accountKeys: [ctx.addresses.pool, OWNER.identity], instruction: Uint8Array.of(0) },
    [OWNER]
  );
  await assert.rejects(() => executeTransaction(ctx, tx, { op: 'initialize' }), /targets program/);
});

test('host: every transaction appends one event', async () => {
  const logFile = path.join(tmpDir('epoch-stake-events-'), 'events.ndjson');
  const { ctx } = makeMemoryCtx({ logFile });

  await runInit(ctx, { owner: OWNER });
  await rejectsWithCode(() => runInit(ctx, { owner: OWNER }), 'AlreadyInitialized');
  await mint(ctx, { asset: stakeAsset, to: ALICE.identity, amount: 5n });

  const events = readEvents(logFile);
  assert.deepEqual(
    events.map((e) => [e.op, e.ok]),
    [
      ['initialize', true],
      ['initialize', false],
      ['mint', true],
    ]
  );
  assert.equal(events[0]?.ts, '2026-03-01T12:00:00.000Z');
  assert.equal(events[1]?.error?.code, 'AlreadyInitialized');
  assert.equal(events[1]?.error?.errorNumber, 11);
  assert.deepEqual(events[2]?.args, { asset: bytesToHex(stakeAsset), amount: '5' });
});

test('host: two deposits racing on one ledger file both persist', async () => {
  const ledgerFile = path.join(tmpDir('epoch-stake-race-'), 'ledger.json');
  const open = async (): Promise<PoolOpContext> => {
    const store = new FileBackedAccountStore({ filename: ledgerFile });
    await store.load();
    return makePoolOpContext({ store, deployment: DEPLOYMENT, logFile: null });
  };

  const setup = await open();
  await runInit(setup, { owner: OWNER });
  await mint(setup, { asset: stakeAsset, to: ALICE.identity, amount: 100n });
  await mint(setup, { asset: stakeAsset, to: BOB.identity, amount: 100n });

  // both contexts load before either deposit runs
  const [a, b] = await Promise.all([open(), open()]);
  const results = await Promise.allSettled([
    runDeposit(a, { participant: ALICE, amount: 100n }),
    runDeposit(b, { participant: BOB, amount: 100n }),
  ]);
  assert.deepEqual(
    results.map((r) => r.status),
    ['fulfilled', 'fulfilled']
  );

  const check = await open();
  assert.equal(readPool(check)?.totalStaked, 200n);
  assert.equal(readPosition(check, ALICE.identity).position?.stakedAmount, 100n);
  assert.equal(readPosition(check, BOB.identity).position?.stakedAmount, 100n);
  assert.equal(getBalance(check.store, stakeAsset, check.addresses.stakeCustody), 200n);
});
