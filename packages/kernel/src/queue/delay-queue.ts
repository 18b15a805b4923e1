/**
 * Holdback Kernel — Delay Queue
 *
 * The DelayQueue is the only path between a proposer and the executor.
 * Proposers append commitments; anyone may later reveal the action behind
 * the entry at the cursor, and it runs once the timing policy clears it.
 * The administrator manages the proposer registry and timing, and may veto
 * or approve pending entries.
 *
 * Operation contract:
 * - The caller identity is the first argument of every state-changing
 *   operation. Authorization is checked before anything else.
 * - The clock is read once per operation.
 * - Every operation runs inside an atomic section. A thrown DelayQueueError
 *   restores counters, registry, and entry arrays, and drops the events the
 *   operation raised. A sink that throws while the events are delivered
 *   rolls the operation back the same way.
 * - ExecutionFailed is the single exception: the executor is called after
 *   the atomic section committed the cursor advance, and a failure does not
 *   undo it.
 *
 * Execution ordering: the approval credit is consumed and the cursor
 * advanced before the executor is awaited. An executor that calls back into
 * the queue sees the entry as consumed.
 */

import type { CommitmentHash, QueuedAction } from '../types/action.js';
import type { Identity } from '../types/identity.js';
import { isNullIdentity, isReservedIdentity } from '../types/identity.js';
import type { DelayQueueSnapshot, DelayQueueState, EntryStatus, QueueEntryView } from '../types/state.js';
import { MIN_EXPIRATION_SECONDS } from '../types/state.js';
import { DelayErrorCode, DelayQueueError } from '../types/errors.js';
import type { Clock, ExecutionContext, Executor } from '../adapters/index.js';
import type { EventSink } from '../logging/event-sink.js';
import { EventLogger } from '../logging/event-log.js';
import { hashAction, hashSecretAction } from '../commitment/hash.js';
import {
  createProposerList,
  insertProposer,
  isProposer,
  pageProposers,
  previousProposer,
  removeProposer,
} from '../registry/proposer-registry.js';
import type { ProposerPage } from '../registry/proposer-registry.js';
import {
  adjustApprovals,
  classifyEntry,
  countExpiredPrefix,
  enforceTimingPolicy,
  entryView,
} from '../timing/policy.js';
import { fromSnapshot, toSnapshot } from './snapshot.js';

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export interface DelayQueueParams {
  /** Identity that set the queue up. Recorded in DelaySetup only. */
  readonly initiator: Identity;
  readonly administrator: Identity;
  readonly avatar: Identity;
  readonly target: Identity;
  readonly cooldown: number;
  readonly expiration: number;
}

export interface DelayQueueDeps {
  readonly executor: Executor;
  readonly clock: Clock;
  /** Receives committed events. Omit to run without persistence. */
  readonly sink?: EventSink;
}

/** Result of a successful execution. */
export interface ExecutionReceipt {
  readonly slot: number;
  readonly commitment: CommitmentHash;
  /**
   * Set when the call succeeded but the sink rejected TransactionExecuted.
   * The slot is consumed either way.
   */
  readonly logError?: unknown;
}

interface Checkpoint {
  readonly administrator: Identity;
  readonly cooldown: number;
  readonly expiration: number;
  readonly cursor: number;
  readonly tail: number;
  readonly approved: number;
  readonly salt: number;
  readonly proposers: Map<Identity, Identity>;
}

export class DelayQueue {
  private readonly logger: EventLogger;

  private constructor(
    private readonly state: DelayQueueState,
    private readonly executor: Executor,
    private readonly clock: Clock,
    sink?: EventSink,
  ) {
    this.logger = new EventLogger(sink);
  }

  /**
   * Set up a new, empty queue and emit DelaySetup.
   *
   * @throws {DelayQueueError} InvalidAvatar, InvalidTarget, InvalidCooldown, InvalidExpiration
   */
  static create(params: DelayQueueParams, deps: DelayQueueDeps): DelayQueue {
    if (isNullIdentity(params.avatar)) {
      throw new DelayQueueError(DelayErrorCode.InvalidAvatar, 'Avatar must not be the null identity');
    }
    if (isNullIdentity(params.target)) {
      throw new DelayQueueError(DelayErrorCode.InvalidTarget, 'Target must not be the null identity');
    }
    assertCooldown(params.cooldown);
    assertExpiration(params.expiration);

    const state: DelayQueueState = {
      administrator: params.administrator,
      avatar: params.avatar,
      target: params.target,
      cooldown: params.cooldown,
      expiration: params.expiration,
      cursor: 0,
      tail: 0,
      approved: 0,
      salt: 0,
      commitments: [],
      createdAt: [],
      proposers: createProposerList(),
    };
    const queue = new DelayQueue(state, deps.executor, deps.clock, deps.sink);
    queue.atomically((now) => {
      queue.logger.record({
        type: 'DelaySetup',
        at: now,
        initiator: params.initiator,
        administrator: params.administrator,
        avatar: params.avatar,
        target: params.target,
      });
    });
    return queue;
  }

  /**
   * Rebuild a queue from a persisted snapshot. Emits nothing.
   *
   * @throws {DelayQueueError} InvalidSnapshot
   */
  static restore(snapshot: DelayQueueSnapshot, deps: DelayQueueDeps): DelayQueue {
    return new DelayQueue(fromSnapshot(snapshot), deps.executor, deps.clock, deps.sink);
  }

  snapshot(): DelayQueueSnapshot {
    return toSnapshot(this.state);
  }

  // -------------------------------------------------------------------------
  // Proposer registry
  // -------------------------------------------------------------------------

  register(caller: Identity, identity: Identity): void {
    this.atomically((now) => {
      this.requireAdministrator(caller);
      insertProposer(this.state.proposers, identity);
      this.logger.record({ type: 'ProposerRegistered', at: now, proposer: identity });
    });
  }

  deregister(caller: Identity, prevIdentity: Identity, identity: Identity): void {
    this.atomically((now) => {
      this.requireAdministrator(caller);
      removeProposer(this.state.proposers, prevIdentity, identity);
      this.logger.record({ type: 'ProposerDeregistered', at: now, proposer: identity });
    });
  }

  // -------------------------------------------------------------------------
  // Commitment queue
  // -------------------------------------------------------------------------

  /** Append a precomputed transparent commitment. Returns the slot written. */
  enqueue(caller: Identity, commitment: CommitmentHash): number {
    return this.atomically((now) => {
      this.requireProposer(caller);
      const slot = this.append(commitment, now);
      this.logger.record({ type: 'TransactionAdded', at: now, slot, commitment, proposer: caller });
      return slot;
    });
  }

  /**
   * Append a commitment computed with the current salt counter (see
   * `saltCounter`). The note is recorded in the event and nothing else.
   */
  enqueueSecret(caller: Identity, commitment: CommitmentHash, note: string): number {
    return this.atomically((now) => {
      this.requireProposer(caller);
      const slot = this.append(commitment, now);
      const salt = this.state.salt;
      this.state.salt = salt + 1;
      this.logger.record({
        type: 'SecretTransactionAdded',
        at: now,
        slot,
        commitment,
        proposer: caller,
        note,
        salt,
      });
      return slot;
    });
  }

  /** Hash and append a full action, publishing its parameters in the event. */
  propose(caller: Identity, action: QueuedAction): number {
    return this.atomically((now) => {
      this.requireProposer(caller);
      const commitment = hashAction(action);
      const slot = this.append(commitment, now);
      this.logger.record({
        type: 'TransactionAdded',
        at: now,
        slot,
        commitment,
        proposer: caller,
        action: {
          to: action.to,
          value: action.value,
          payload: action.payload,
          callType: action.callType,
        },
      });
      return slot;
    });
  }

  // -------------------------------------------------------------------------
  // Execution gate
  // -------------------------------------------------------------------------

  /**
   * Execute the entry at the cursor if `action` matches its transparent
   * commitment. Callable by anyone.
   *
   * @throws {DelayQueueError} QueueEmpty, StillInCooldown, Expired, HashMismatch (no state change)
   * @throws {DelayQueueError} ExecutionFailed (cursor advance is kept)
   */
  executeNext(caller: Identity, action: QueuedAction): Promise<ExecutionReceipt> {
    return this.execute(caller, action, hashAction(action));
  }

  /** As executeNext, for entries added with enqueueSecret. */
  executeNextSecret(caller: Identity, action: QueuedAction, salt: number): Promise<ExecutionReceipt> {
    return this.execute(caller, action, hashSecretAction(action, salt));
  }

  /**
   * Move the cursor past every expired entry at the front of the queue.
   * Callable by anyone; never fails. Returns the number of entries skipped.
   */
  skipExpired(caller: Identity): number {
    return this.atomically((now) => {
      const fromCursor = this.state.cursor;
      const count = countExpiredPrefix(this.state, now);
      if (count === 0) return 0;
      this.state.approved = adjustApprovals(this.state.approved, count);
      this.state.cursor = fromCursor + count;
      this.logger.record({ type: 'ExpiredSkipped', at: now, fromCursor, count, caller });
      return count;
    });
  }

  // -------------------------------------------------------------------------
  // Override protocol
  // -------------------------------------------------------------------------

  /**
   * Cancel every pending entry below `newCursor`.
   *
   * @throws {DelayQueueError} NotAuthorized, NonIncreasingNonce, OutOfRange
   */
  vetoUpTo(caller: Identity, newCursor: number): void {
    this.atomically((now) => {
      this.requireAdministrator(caller);
      this.veto(newCursor, now);
    });
  }

  /**
   * Veto up to `newCursor` (skipped when it does not move the cursor), then
   * approve `approveCount` entries from the resulting cursor. Either both
   * take effect or neither does.
   */
  vetoUpToAndApprove(caller: Identity, newCursor: number, approveCount: number): void {
    this.atomically((now) => {
      this.requireAdministrator(caller);
      if (newCursor > this.state.cursor) {
        this.veto(newCursor, now);
      }
      this.approve(approveCount, now);
    });
  }

  /**
   * Let the next `count` entries execute without waiting out the cooldown.
   * Replaces any outstanding approval.
   *
   * @throws {DelayQueueError} NotAuthorized, ZeroApproval, UnknownEntries
   */
  approveNext(caller: Identity, count: number): void {
    this.atomically((now) => {
      this.requireAdministrator(caller);
      this.approve(count, now);
    });
  }

  // -------------------------------------------------------------------------
  // Administration
  // -------------------------------------------------------------------------

  setCooldown(caller: Identity, cooldown: number): void {
    this.atomically((now) => {
      this.requireAdministrator(caller);
      assertCooldown(cooldown);
      this.state.cooldown = cooldown;
      this.logger.record({ type: 'CooldownSet', at: now, cooldown });
    });
  }

  setExpiration(caller: Identity, expiration: number): void {
    this.atomically((now) => {
      this.requireAdministrator(caller);
      assertExpiration(expiration);
      this.state.expiration = expiration;
      this.logger.record({ type: 'ExpirationSet', at: now, expiration });
    });
  }

  transferAdministration(caller: Identity, next: Identity): void {
    this.atomically((now) => {
      this.requireAdministrator(caller);
      if (isReservedIdentity(next)) {
        throw new DelayQueueError(
          DelayErrorCode.InvalidIdentity,
          `Identity '${next}' is reserved and cannot administer a queue`,
        );
      }
      const previous = this.state.administrator;
      this.state.administrator = next;
      this.logger.record({ type: 'AdministrationTransferred', at: now, previous, next });
    });
  }

  // -------------------------------------------------------------------------
  // Views
  // -------------------------------------------------------------------------

  get cursor(): number {
    return this.state.cursor;
  }

  get tail(): number {
    return this.state.tail;
  }

  get approvedCount(): number {
    return this.state.approved;
  }

  get saltCounter(): number {
    return this.state.salt;
  }

  get cooldown(): number {
    return this.state.cooldown;
  }

  get expiration(): number {
    return this.state.expiration;
  }

  get administrator(): Identity {
    return this.state.administrator;
  }

  get avatar(): Identity {
    return this.state.avatar;
  }

  get target(): Identity {
    return this.state.target;
  }

  commitmentAt(slot: number): CommitmentHash | undefined {
    return this.state.commitments[slot];
  }

  createdAtOf(slot: number): number | undefined {
    return this.state.createdAt[slot];
  }

  isRegistered(identity: Identity): boolean {
    return isProposer(this.state.proposers, identity);
  }

  listPaginated(start: Identity, pageSize: number): ProposerPage {
    return pageProposers(this.state.proposers, start, pageSize);
  }

  previousOf(identity: Identity): Identity | undefined {
    return previousProposer(this.state.proposers, identity);
  }

  entryStatus(slot: number, now: number = this.clock.now()): EntryStatus {
    return classifyEntry(this.state, slot, now);
  }

  /** Every entry from the cursor to the tail, described at `now`. */
  pendingEntries(now: number = this.clock.now()): ReadonlyArray<QueueEntryView> {
    const views: QueueEntryView[] = [];
    for (let slot = this.state.cursor; slot < this.state.tail; slot++) {
      const view = entryView(this.state, slot, now);
      if (view !== undefined) views.push(view);
    }
    return views;
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private async execute(
    caller: Identity,
    action: QueuedAction,
    revealed: CommitmentHash,
  ): Promise<ExecutionReceipt> {
    const { slot, at } = this.atomically((now) => {
      const next = enforceTimingPolicy(this.state, now);
      if (this.state.commitments[next] !== revealed) {
        throw new DelayQueueError(
          DelayErrorCode.HashMismatch,
          `Revealed action does not match the commitment at slot ${next}`,
        );
      }
      this.state.cursor = next + 1;
      return { slot: next, at: now };
    });

    const context: ExecutionContext = {
      slot,
      avatar: this.state.avatar,
      target: this.state.target,
      commitment: revealed,
      caller,
    };

    let success = false;
    let cause: unknown;
    try {
      success = await this.executor.performCall(action, context);
    } catch (err) {
      cause = err;
    }

    this.logger.record({
      type: 'TransactionExecuted',
      at,
      slot,
      commitment: revealed,
      caller,
      success,
    });
    let logError: unknown;
    try {
      this.logger.commit();
    } catch (err) {
      logError = err;
    }

    if (!success) {
      const reason = combineCauses(cause, logError);
      throw new DelayQueueError(
        DelayErrorCode.ExecutionFailed,
        `Execution of slot ${slot} failed; the entry is consumed`,
        reason === undefined ? undefined : { cause: reason },
      );
    }
    return logError === undefined
      ? { slot, commitment: revealed }
      : { slot, commitment: revealed, logError };
  }

  private veto(newCursor: number, now: number): void {
    const fromCursor = this.state.cursor;
    if (!Number.isSafeInteger(newCursor) || newCursor <= fromCursor) {
      throw new DelayQueueError(
        DelayErrorCode.NonIncreasingNonce,
        `New cursor ${newCursor} must be greater than the current cursor ${fromCursor}`,
      );
    }
    if (newCursor > this.state.tail) {
      throw new DelayQueueError(
        DelayErrorCode.OutOfRange,
        `New cursor ${newCursor} is beyond the tail ${this.state.tail}`,
      );
    }
    const count = newCursor - fromCursor;
    this.state.approved = adjustApprovals(this.state.approved, count);
    this.logger.record({ type: 'TransactionsVetoed', at: now, fromCursor, count });
    this.state.cursor = newCursor;
  }

  private approve(count: number, now: number): void {
    if (count === 0) {
      throw new DelayQueueError(DelayErrorCode.ZeroApproval, 'Approval count must be non-zero');
    }
    const pending = this.state.tail - this.state.cursor;
    if (!Number.isSafeInteger(count) || count < 0 || count > pending) {
      throw new DelayQueueError(
        DelayErrorCode.UnknownEntries,
        `Cannot approve ${count} entries; ${pending} pending`,
      );
    }
    this.state.approved = count;
    this.logger.record({ type: 'TransactionsApproved', at: now, cursor: this.state.cursor, count });
  }

  private append(commitment: CommitmentHash, now: number): number {
    const slot = this.state.tail;
    this.state.commitments.push(commitment);
    this.state.createdAt.push(now);
    this.state.tail = slot + 1;
    return slot;
  }

  private requireAdministrator(caller: Identity): void {
    if (isReservedIdentity(caller) || caller !== this.state.administrator) {
      throw new DelayQueueError(
        DelayErrorCode.NotAuthorized,
        `'${caller}' is not the administrator of this queue`,
      );
    }
  }

  private requireProposer(caller: Identity): void {
    if (!isProposer(this.state.proposers, caller)) {
      throw new DelayQueueError(DelayErrorCode.NotAuthorized, `'${caller}' is not a registered proposer`);
    }
  }

  /**
   * Run `fn` with one clock reading and deliver its events. If `fn` or the
   * sink throws, restore the checkpoint, drop buffered events and rethrow.
   */
  private atomically<T>(fn: (now: number) => T): T {
    const checkpoint = this.checkpoint();
    try {
      const result = fn(this.clock.now());
      this.logger.commit();
      return result;
    } catch (err) {
      this.rollback(checkpoint);
      this.logger.discard();
      throw err;
    }
  }

  private checkpoint(): Checkpoint {
    const s = this.state;
    return {
      administrator: s.administrator,
      cooldown: s.cooldown,
      expiration: s.expiration,
      cursor: s.cursor,
      tail: s.tail,
      approved: s.approved,
      salt: s.salt,
      proposers: new Map(s.proposers),
    };
  }

  private rollback(checkpoint: Checkpoint): void {
    const s = this.state;
    s.administrator = checkpoint.administrator;
    s.cooldown = checkpoint.cooldown;
    s.expiration = checkpoint.expiration;
    s.cursor = checkpoint.cursor;
    s.tail = checkpoint.tail;
    s.approved = checkpoint.approved;
    s.salt = checkpoint.salt;
    s.commitments.length = checkpoint.tail;
    s.createdAt.length = checkpoint.tail;
    s.proposers.clear();
    for (const [from, to] of checkpoint.proposers) {
      s.proposers.set(from, to);
    }
  }
}

/** The executor's error, the sink's, both, or neither. */
function combineCauses(executorError: unknown, logError: unknown): unknown {
  if (logError === undefined) return executorError;
  if (executorError === undefined) return logError;
  return new AggregateError([executorError, logError], 'Execution and event logging both failed');
}

// ---------------------------------------------------------------------------
// Configuration checks
// ---------------------------------------------------------------------------

function assertCooldown(cooldown: number): void {
  if (!Number.isSafeInteger(cooldown) || cooldown < 0) {
    throw new DelayQueueError(
      DelayErrorCode.InvalidCooldown,
      `Cooldown must be a non-negative whole number of seconds, got ${cooldown}`,
    );
  }
}

function assertExpiration(expiration: number): void {
  if (
    !Number.isSafeInteger(expiration) ||
    expiration < 0 ||
    (expiration !== 0 && expiration < MIN_EXPIRATION_SECONDS)
  ) {
    throw new DelayQueueError(
      DelayErrorCode.InvalidExpiration,
      `Expiration must be 0 or at least ${MIN_EXPIRATION_SECONDS} seconds, got ${expiration}`,
    );
  }
}
