/**
 * Holdback Kernel — Queue State
 *
 * DelayQueueState is the single owned state object of a delay queue. Every
 * operation receives it by reference; nothing in the kernel keeps queue
 * state anywhere else.
 *
 * Invariants (hold after every operation that returns normally):
 *   0 <= cursor <= tail
 *   0 <= approved <= tail - cursor
 *   commitments.length === createdAt.length === tail
 *   proposers forms one cycle through SENTINEL_IDENTITY
 *
 * DelayQueueSnapshot is the JSON-safe form of the same state, used for
 * persistence by the runtime host.
 */

import type { CommitmentHash } from './action.js';
import type { Identity } from './identity.js';

/** Minimum non-zero expiration window, in seconds. */
export const MIN_EXPIRATION_SECONDS = 60;

export interface DelayQueueState {
  administrator: Identity;
  readonly avatar: Identity;
  readonly target: Identity;
  /** Seconds an entry must wait before default execution. */
  cooldown: number;
  /** Seconds after cooldown during which an entry stays executable. 0 = never expires. */
  expiration: number;
  /** Slot of the next entry eligible for execution. */
  cursor: number;
  /** Slot the next enqueued entry is written to. */
  tail: number;
  /** Entries, counted from the cursor, that may skip the cooldown. */
  approved: number;
  /** Next salt handed to a secret enqueue. */
  salt: number;
  readonly commitments: CommitmentHash[];
  /** Clock reading (seconds) at which each slot was written. */
  readonly createdAt: number[];
  /** identity → next identity in registry order. */
  readonly proposers: Map<Identity, Identity>;
}

export interface DelayQueueSnapshot {
  readonly version: 1;
  readonly administrator: Identity;
  readonly avatar: Identity;
  readonly target: Identity;
  readonly cooldown: number;
  readonly expiration: number;
  readonly cursor: number;
  readonly tail: number;
  readonly approved: number;
  readonly salt: number;
  readonly commitments: ReadonlyArray<string>;
  readonly createdAt: ReadonlyArray<number>;
  /** Registry links in traversal order, starting at the sentinel. */
  readonly proposers: ReadonlyArray<readonly [Identity, Identity]>;
}

/**
 * How a slot looks from the outside at a given clock reading.
 *
 *   consumed — below the cursor (executed, vetoed, or skipped)
 *   cooling  — cooldown still running and not covered by an approval
 *   approved — covered by an approval credit
 *   ready    — cooldown elapsed
 *   expired  — past cooldown + expiration; can only be skipped or vetoed
 *   unknown  — at or beyond the tail
 */
export type EntryStatus = 'consumed' | 'cooling' | 'approved' | 'ready' | 'expired' | 'unknown';

export interface QueueEntryView {
  readonly slot: number;
  readonly commitment: CommitmentHash;
  readonly createdAt: number;
  readonly status: EntryStatus;
  /** Earliest clock reading at which default execution is allowed. */
  readonly readyAt: number;
  /** Last clock reading at which execution is allowed; null when entries never expire. */
  readonly expiresAt: number | null;
}
