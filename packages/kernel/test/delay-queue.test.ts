/**
 * Holdback Kernel — Delay Queue Tests
 *
 * End-to-end behaviour of the queue: construction, enqueue in both modes,
 * the execution gate, and skip-expired. Every test runs on a manual clock
 * with a recording executor; nothing leaves the process.
 */

import { describe, it, expect } from 'vitest';
import {
  CallType,
  DelayErrorCode,
  DelayQueue,
  DelayQueueError,
  NULL_IDENTITY,
  SENTINEL_IDENTITY,
  hashAction,
  hashSecretAction,
  isDelayQueueError,
} from '../src/index.js';
import type { DelayQueueParams } from '../src/index.js';
import {
  ADMIN,
  AVATAR,
  OUTSIDER,
  PROPOSER,
  START,
  ManualClock,
  MemorySink,
  RecordingExecutor,
  action,
  makeQueue,
} from './helpers.js';

async function rejection(promise: Promise<unknown>): Promise<DelayQueueError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof DelayQueueError) return err;
    throw err;
  }
  throw new Error('expected the operation to fail');
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isDelayQueueError(err) ? err.code : 'unexpected';
  }
  return undefined;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

describe('construction', () => {
  const deps = { executor: new RecordingExecutor(), clock: new ManualClock() };
  const params: DelayQueueParams = {
    initiator: '0xdeployer',
    administrator: ADMIN,
    avatar: AVATAR,
    target: '0xtarget',
    cooldown: 10,
    expiration: 0,
  };

  it('emits DelaySetup with all four identities', () => {
    const sink = new MemorySink();
    const queue = DelayQueue.create(params, { ...deps, sink });
    expect(sink.events).toEqual([
      {
        type: 'DelaySetup',
        at: START,
        initiator: '0xdeployer',
        administrator: ADMIN,
        avatar: AVATAR,
        target: '0xtarget',
      },
    ]);
    expect(queue.cursor).toBe(0);
    expect(queue.tail).toBe(0);
    expect(queue.cooldown).toBe(10);
  });

  it('rejects null avatar and target', () => {
    expect(codeOf(() => DelayQueue.create({ ...params, avatar: NULL_IDENTITY }, deps))).toBe(
      DelayErrorCode.InvalidAvatar,
    );
    expect(codeOf(() => DelayQueue.create({ ...params, target: '' }, deps))).toBe(
      DelayErrorCode.InvalidTarget,
    );
  });

  it('rejects a non-zero expiration below 60 seconds', () => {
    expect(codeOf(() => DelayQueue.create({ ...params, expiration: 59 }, deps))).toBe(
      DelayErrorCode.InvalidExpiration,
    );
    expect(codeOf(() => DelayQueue.create({ ...params, expiration: 60 }, deps))).toBeUndefined();
  });

  it('rejects a negative or fractional cooldown', () => {
    expect(codeOf(() => DelayQueue.create({ ...params, cooldown: -1 }, deps))).toBe(
      DelayErrorCode.InvalidCooldown,
    );
    expect(codeOf(() => DelayQueue.create({ ...params, cooldown: 0.5 }, deps))).toBe(
      DelayErrorCode.InvalidCooldown,
    );
  });
});

// ---------------------------------------------------------------------------
// Enqueue
// ---------------------------------------------------------------------------

describe('enqueue', () => {
  it('writes at the tail and stamps the clock', () => {
    const { queue, clock } = makeQueue();
    const hash = hashAction(action(1));
    expect(queue.enqueue(PROPOSER, hash)).toBe(0);
    clock.advance(5);
    expect(queue.enqueue(PROPOSER, hash)).toBe(1);
    expect(queue.tail).toBe(2);
    expect(queue.commitmentAt(1)).toBe(hash);
    expect(queue.createdAtOf(0)).toBe(START);
    expect(queue.createdAtOf(1)).toBe(START + 5);
    expect(queue.commitmentAt(2)).toBeUndefined();
  });

  it('accepts only registered proposers', () => {
    const { queue } = makeQueue();
    const hash = hashAction(action(1));
    expect(codeOf(() => queue.enqueue(OUTSIDER, hash))).toBe(DelayErrorCode.NotAuthorized);
    expect(codeOf(() => queue.enqueue(ADMIN, hash))).toBe(DelayErrorCode.NotAuthorized);
    expect(codeOf(() => queue.enqueueSecret(SENTINEL_IDENTITY, hash, 'n'))).toBe(
      DelayErrorCode.NotAuthorized,
    );
    expect(queue.tail).toBe(0);
  });

  it('consumes one salt per secret enqueue and reports it', () => {
    const { queue, sink } = makeQueue();
    queue.enqueueSecret(PROPOSER, hashSecretAction(action(1), 0), 'ipfs://note-0');
    queue.enqueueSecret(PROPOSER, hashSecretAction(action(2), 1), 'ipfs://note-1');
    expect(queue.saltCounter).toBe(2);
    expect(sink.events.at(-1)).toEqual({
      type: 'SecretTransactionAdded',
      at: START,
      slot: 1,
      commitment: hashSecretAction(action(2), 1),
      proposer: PROPOSER,
      note: 'ipfs://note-1',
      salt: 1,
    });
  });

  it('propose hashes the action and publishes it', () => {
    const { queue, sink } = makeQueue();
    const a = action(4, { callType: CallType.DelegateCall });
    const slot = queue.propose(PROPOSER, a);
    expect(queue.commitmentAt(slot)).toBe(hashAction(a));
    expect(sink.events.at(-1)).toEqual({
      type: 'TransactionAdded',
      at: START,
      slot: 0,
      commitment: hashAction(a),
      proposer: PROPOSER,
      action: { to: a.to, value: 4n, payload: a.payload, callType: CallType.DelegateCall },
    });
  });
});

// ---------------------------------------------------------------------------
// Scenarios
// ---------------------------------------------------------------------------

describe('scenario A: zero cooldown', () => {
  it('executes immediately and advances the cursor', async () => {
    const { queue, executor } = makeQueue(0);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    const receipt = await queue.executeNext(OUTSIDER, action(1));
    expect(receipt).toEqual({ slot: 0, commitment: hashAction(action(1)) });
    expect(queue.cursor).toBe(1);
    expect(executor.calls).toHaveLength(1);
  });
});

describe('scenario B: cooldown', () => {
  it('rejects execution until the cooldown has elapsed', async () => {
    const { queue, clock, executor } = makeQueue(42);
    queue.enqueue(PROPOSER, hashAction(action(1)));

    const err = await rejection(queue.executeNext(OUTSIDER, action(1)));
    expect(err.code).toBe(DelayErrorCode.StillInCooldown);
    expect(queue.cursor).toBe(0);

    clock.advance(41);
    expect((await rejection(queue.executeNext(OUTSIDER, action(1)))).code).toBe(
      DelayErrorCode.StillInCooldown,
    );

    clock.advance(1);
    await queue.executeNext(OUTSIDER, action(1));
    expect(queue.cursor).toBe(1);
    expect(executor.calls).toHaveLength(1);
  });
});

describe('scenario D: approval credits', () => {
  it('lets one approved entry skip the cooldown', async () => {
    const { queue } = makeQueue(100);
    queue.enqueue(PROPOSER, hashAction(action(0)));
    queue.enqueue(PROPOSER, hashAction(action(1)));

    queue.approveNext(ADMIN, 1);
    expect(queue.approvedCount).toBe(1);

    await queue.executeNext(OUTSIDER, action(0));
    expect(queue.approvedCount).toBe(0);
    expect(queue.cursor).toBe(1);

    const err = await rejection(queue.executeNext(OUTSIDER, action(1)));
    expect(err.code).toBe(DelayErrorCode.StillInCooldown);
  });
});

describe('scenario E: expiration', () => {
  it('rejects an expired entry and lets anyone skip it', async () => {
    const { queue, clock, sink } = makeQueue(0, 60);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    clock.advance(61);

    const err = await rejection(queue.executeNext(OUTSIDER, action(1)));
    expect(err.code).toBe(DelayErrorCode.Expired);
    expect(queue.cursor).toBe(0);

    expect(queue.skipExpired(OUTSIDER)).toBe(1);
    expect(queue.cursor).toBe(1);
    expect(sink.events.at(-1)).toEqual({
      type: 'ExpiredSkipped',
      at: START + 61,
      fromCursor: 0,
      count: 1,
      caller: OUTSIDER,
    });
  });
});

describe('scenario F: secret mode', () => {
  it('requires the salt the entry was committed with', async () => {
    const { queue, executor } = makeQueue(0);
    const a = action(9, { value: 10n ** 18n, payload: '0xa9059cbb' });
    const salt = queue.saltCounter;
    queue.enqueueSecret(PROPOSER, hashSecretAction(a, salt), 'memo');

    const err = await rejection(queue.executeNextSecret(OUTSIDER, a, salt + 1));
    expect(err.code).toBe(DelayErrorCode.HashMismatch);
    expect(queue.cursor).toBe(0);
    expect(executor.calls).toHaveLength(0);

    await queue.executeNextSecret(OUTSIDER, a, salt);
    expect(queue.cursor).toBe(1);
    expect(executor.calls).toEqual([
      {
        action: a,
        context: {
          slot: 0,
          avatar: AVATAR,
          target: '0xtarget',
          commitment: hashSecretAction(a, salt),
          caller: OUTSIDER,
        },
      },
    ]);
  });

  it('does not accept a transparent reveal for a secret entry', async () => {
    const { queue } = makeQueue(0);
    queue.enqueueSecret(PROPOSER, hashSecretAction(action(1), 0), '');
    expect((await rejection(queue.executeNext(OUTSIDER, action(1)))).code).toBe(
      DelayErrorCode.HashMismatch,
    );
  });
});

// ---------------------------------------------------------------------------
// Execution gate details
// ---------------------------------------------------------------------------

describe('execution', () => {
  it('fails with QueueEmpty when nothing is pending', async () => {
    const { queue } = makeQueue();
    expect((await rejection(queue.executeNext(OUTSIDER, action(1)))).code).toBe(
      DelayErrorCode.QueueEmpty,
    );
  });

  it('keeps the slot consumed when the executor reports failure', async () => {
    const { queue, executor, sink } = makeQueue(0);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    queue.enqueue(PROPOSER, hashAction(action(2)));
    executor.outcome = false;

    const err = await rejection(queue.executeNext(OUTSIDER, action(1)));
    expect(err.code).toBe(DelayErrorCode.ExecutionFailed);
    expect(err.cause).toBeUndefined();
    expect(queue.cursor).toBe(1);
    expect(sink.events.at(-1)).toMatchObject({ type: 'TransactionExecuted', slot: 0, success: false });

    executor.outcome = true;
    await queue.executeNext(OUTSIDER, action(2));
    expect(queue.cursor).toBe(2);
  });

  it('treats a throwing executor as a failure and keeps the cause', async () => {
    const { queue, executor } = makeQueue(0);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    const boom = new Error('relayer offline');
    executor.outcome = boom;

    const err = await rejection(queue.executeNext(OUTSIDER, action(1)));
    expect(err.code).toBe(DelayErrorCode.ExecutionFailed);
    expect(err.cause).toBe(boom);
    expect(queue.cursor).toBe(1);
  });

  it('consumes the approval credit even when execution fails', async () => {
    const { queue, executor } = makeQueue(100);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    queue.approveNext(ADMIN, 1);
    executor.outcome = false;
    await rejection(queue.executeNext(OUTSIDER, action(1)));
    expect(queue.approvedCount).toBe(0);
  });

  it('restores the approval credit on a hash mismatch', async () => {
    const { queue } = makeQueue(100);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    queue.approveNext(ADMIN, 1);
    const err = await rejection(queue.executeNext(OUTSIDER, action(2)));
    expect(err.code).toBe(DelayErrorCode.HashMismatch);
    expect(queue.approvedCount).toBe(1);
    expect(queue.cursor).toBe(0);
  });

  it('has advanced the cursor by the time the executor runs', async () => {
    const clock = new ManualClock();
    let observed = -1;
    const queue: DelayQueue = DelayQueue.create(
      { initiator: ADMIN, administrator: ADMIN, avatar: AVATAR, target: '0xtarget', cooldown: 0, expiration: 0 },
      {
        clock,
        executor: {
          performCall: async () => {
            observed = queue.cursor;
            return true;
          },
        },
      },
    );
    queue.register(ADMIN, PROPOSER);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    await queue.executeNext(OUTSIDER, action(1));
    expect(observed).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Skip expired
// ---------------------------------------------------------------------------

describe('skipExpired', () => {
  it('is a no-op when nothing has expired', () => {
    const { queue, sink } = makeQueue(0, 60);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    const before = sink.events.length;
    expect(queue.skipExpired(OUTSIDER)).toBe(0);
    expect(sink.events).toHaveLength(before);
  });

  it('is idempotent without an intervening clock change', () => {
    const { queue, clock } = makeQueue(0, 60);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    clock.advance(30);
    queue.enqueue(PROPOSER, hashAction(action(2)));
    clock.advance(40);

    expect(queue.skipExpired(OUTSIDER)).toBe(1);
    expect(queue.cursor).toBe(1);
    expect(queue.skipExpired(OUTSIDER)).toBe(0);
    expect(queue.cursor).toBe(1);
  });

  it('never skips when expiration is disabled', () => {
    const { queue, clock } = makeQueue(0, 0);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    clock.advance(10 ** 9);
    expect(queue.skipExpired(OUTSIDER)).toBe(0);
  });

  it('drops approval credits that covered skipped entries', () => {
    const { queue, clock } = makeQueue(100, 60);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    queue.enqueue(PROPOSER, hashAction(action(2)));
    queue.approveNext(ADMIN, 2);
    clock.advance(161);
    expect(queue.skipExpired(OUTSIDER)).toBe(2);
    expect(queue.approvedCount).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Sink failures
// ---------------------------------------------------------------------------

describe('sink failures', () => {
  it('rolls an enqueue back when its event cannot be delivered', () => {
    const { queue, sink } = makeQueue();
    const diskFull = new Error('disk full');
    sink.failure = diskFull;

    expect(() => queue.enqueue(PROPOSER, hashAction(action(1)))).toThrow(diskFull);
    expect(queue.tail).toBe(0);
    expect(queue.commitmentAt(0)).toBeUndefined();

    sink.failure = undefined;
    expect(queue.enqueue(PROPOSER, hashAction(action(1)))).toBe(0);
    expect(sink.events.at(-1)).toMatchObject({ type: 'TransactionAdded', slot: 0 });
  });

  it('rolls back both halves of veto-and-approve', () => {
    const { queue, sink } = makeQueue(100);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    queue.enqueue(PROPOSER, hashAction(action(2)));
    const before = sink.events.length;
    sink.failure = new Error('disk full');

    expect(() => queue.vetoUpToAndApprove(ADMIN, 1, 1)).toThrow('disk full');
    expect(queue.cursor).toBe(0);
    expect(queue.approvedCount).toBe(0);
    expect(sink.events).toHaveLength(before);
  });

  it('keeps the receipt of a successful call whose event was not logged', async () => {
    const { queue, sink, executor } = makeQueue(0);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    const diskFull = new Error('disk full');
    sink.failure = diskFull;

    const receipt = await queue.executeNext(OUTSIDER, action(1));
    expect(receipt.slot).toBe(0);
    expect(receipt.commitment).toBe(hashAction(action(1)));
    expect(receipt.logError).toBe(diskFull);
    expect(queue.cursor).toBe(1);
    expect(executor.calls).toHaveLength(1);
  });

  it('leaves logError unset when the event was logged', async () => {
    const { queue } = makeQueue(0);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    const receipt = await queue.executeNext(OUTSIDER, action(1));
    expect(receipt.logError).toBeUndefined();
  });

  it('reports ExecutionFailed with the sink error as cause after a false result', async () => {
    const { queue, sink, executor } = makeQueue(0);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    executor.outcome = false;
    const diskFull = new Error('disk full');
    sink.failure = diskFull;

    const err = await rejection(queue.executeNext(OUTSIDER, action(1)));
    expect(err.code).toBe(DelayErrorCode.ExecutionFailed);
    expect(err.cause).toBe(diskFull);
    expect(queue.cursor).toBe(1);
  });

  it('carries both errors when the executor and the sink fail', async () => {
    const { queue, sink, executor } = makeQueue(0);
    queue.enqueue(PROPOSER, hashAction(action(1)));
    const offline = new Error('relayer offline');
    const diskFull = new Error('disk full');
    executor.outcome = offline;
    sink.failure = diskFull;

    const err = await rejection(queue.executeNext(OUTSIDER, action(1)));
    expect(err.code).toBe(DelayErrorCode.ExecutionFailed);
    expect(err.cause).toBeInstanceOf(AggregateError);
    const cause = err.cause;
    expect(cause instanceof AggregateError ? cause.errors : []).toEqual([offline, diskFull]);
  });
});
