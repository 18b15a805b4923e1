/**
 * Holdback Kernel — Adapter Interfaces
 *
 * The queue reaches the outside world through exactly two injected
 * adapters: a Clock for the time that entries are stamped and checked
 * against, and an Executor that performs a cleared action on behalf of the
 * avatar.
 *
 * No implementations are provided here. Adapters are injected, not
 * constructed. Concrete implementations live in @holdback/runtime-host.
 */

import type { CommitmentHash, QueuedAction } from '../types/action.js';
import type { Identity } from '../types/identity.js';

/**
 * Source of the current time, in whole seconds.
 *
 * The kernel reads the clock once per operation. Readings are expected to
 * be non-decreasing across operations; the timing policy does not guard
 * against a clock that moves backwards.
 */
export interface Clock {
  now(): number;
}

/** Passed to the executor with every call. */
export interface ExecutionContext {
  /** Slot of the entry being executed. The cursor has already moved past it. */
  readonly slot: number;
  readonly avatar: Identity;
  readonly target: Identity;
  readonly commitment: CommitmentHash;
  /** Identity that triggered execution. */
  readonly caller: Identity;
}

/**
 * Performs an action against the target on behalf of the avatar.
 *
 * Resolves true on success and false on failure. A rejected promise is
 * treated the same as `false`: the queue reports ExecutionFailed with the
 * rejection as its cause.
 */
export interface Executor {
  performCall(action: QueuedAction, context: ExecutionContext): Promise<boolean>;
}
