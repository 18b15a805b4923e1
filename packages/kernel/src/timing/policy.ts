/**
 * Holdback Kernel — Timing Policy
 *
 * Decides whether the entry at the cursor may execute at a clock reading.
 * An entry passes when all of:
 *
 *   - the queue is non-empty (cursor < tail)
 *   - its cooldown has elapsed, or an approval credit covers it
 *   - it has not expired (expiration 0 disables expiry)
 *
 * Approval credits bypass the cooldown only. An approved entry that has
 * expired is still rejected.
 *
 * Expiry is strict: an entry created at t with cooldown c and expiration e
 * is still executable at exactly t + c + e, and expired one second later.
 */

import type { DelayQueueState, EntryStatus, QueueEntryView } from '../types/state.js';
import { DelayErrorCode, DelayQueueError } from '../types/errors.js';

export function isExpired(
  createdAt: number,
  cooldown: number,
  expiration: number,
  now: number,
): boolean {
  return expiration !== 0 && createdAt + cooldown + expiration < now;
}

/**
 * Check the entry at the cursor against the timing policy and return its slot.
 *
 * On success, one approval credit is consumed if any is outstanding, whether
 * or not the entry needed it. Callers run this inside an atomic section so a
 * later failure (e.g. HashMismatch) restores the credit.
 *
 * @throws {DelayQueueError} QueueEmpty, StillInCooldown, or Expired
 */
export function enforceTimingPolicy(state: DelayQueueState, now: number): number {
  const slot = state.cursor;
  if (slot >= state.tail) {
    throw new DelayQueueError(DelayErrorCode.QueueEmpty, 'No pending entries');
  }

  const createdAt = createdAtOf(state, slot);
  if (now - createdAt < state.cooldown && state.approved === 0) {
    throw new DelayQueueError(
      DelayErrorCode.StillInCooldown,
      `Entry ${slot} is cooling down until ${createdAt + state.cooldown}`,
    );
  }
  if (isExpired(createdAt, state.cooldown, state.expiration, now)) {
    throw new DelayQueueError(
      DelayErrorCode.Expired,
      `Entry ${slot} expired at ${createdAt + state.cooldown + state.expiration}`,
    );
  }

  if (state.approved > 0) {
    state.approved -= 1;
  }
  return slot;
}

/**
 * Number of consecutive expired entries starting at the cursor.
 *
 * Entries are created in clock order and share one cooldown and expiration,
 * so expired entries always form a prefix of the pending range.
 */
export function countExpiredPrefix(state: DelayQueueState, now: number): number {
  let count = 0;
  for (let slot = state.cursor; slot < state.tail; slot++) {
    if (!isExpired(createdAtOf(state, slot), state.cooldown, state.expiration, now)) break;
    count++;
  }
  return count;
}

/**
 * New approval count after `skipped` entries are removed from the front of
 * the pending range. Credits cover the first entries after the cursor, so
 * removing entries consumes credits first. Never goes below zero.
 */
export function adjustApprovals(approved: number, skipped: number): number {
  return approved > skipped ? approved - skipped : 0;
}

export function classifyEntry(state: DelayQueueState, slot: number, now: number): EntryStatus {
  if (slot >= state.tail) return 'unknown';
  if (slot < state.cursor) return 'consumed';
  const createdAt = createdAtOf(state, slot);
  if (isExpired(createdAt, state.cooldown, state.expiration, now)) return 'expired';
  if (slot - state.cursor < state.approved) return 'approved';
  return now - createdAt >= state.cooldown ? 'ready' : 'cooling';
}

/** Describe a written slot; undefined for slots at or beyond the tail. */
export function entryView(
  state: DelayQueueState,
  slot: number,
  now: number,
): QueueEntryView | undefined {
  const commitment = state.commitments[slot];
  const createdAt = state.createdAt[slot];
  if (commitment === undefined || createdAt === undefined) return undefined;
  return {
    slot,
    commitment,
    createdAt,
    status: classifyEntry(state, slot, now),
    readyAt: createdAt + state.cooldown,
    expiresAt: state.expiration === 0 ? null : createdAt + state.cooldown + state.expiration,
  };
}

function createdAtOf(state: DelayQueueState, slot: number): number {
  const createdAt = state.createdAt[slot];
  if (createdAt === undefined) {
    // Unreachable while commitments.length === createdAt.length === tail.
    throw new DelayQueueError(DelayErrorCode.QueueEmpty, `Slot ${slot} has not been written`);
  }
  return createdAt;
}
