/**
 * Holdback Kernel — Proposer Registry
 *
 * The set of identities allowed to enqueue, stored as a singly linked list
 * in a Map: each registered identity maps to the next one, and the sentinel
 * is both the head and the value the last entry points back to.
 *
 *   empty:        SENTINEL → SENTINEL
 *   after a, b:   SENTINEL → b → a → SENTINEL
 *
 * An identity is registered iff it has a recorded successor. New entries are
 * inserted at the head, so traversal order is most-recent first.
 *
 * These functions check list integrity only. Authorization (administrator
 * only) is enforced by DelayQueue before any of them is called.
 */

import type { Identity } from '../types/identity.js';
import { SENTINEL_IDENTITY, isReservedIdentity } from '../types/identity.js';
import { DelayErrorCode, DelayQueueError } from '../types/errors.js';

export interface ProposerPage {
  readonly identities: ReadonlyArray<Identity>;
  /**
   * Cursor for the following page: the last identity returned when more
   * remain, SENTINEL_IDENTITY when the list is exhausted.
   */
  readonly next: Identity;
}

/** Build a list containing `initial` (inserted in order, so the last one is the head). */
export function createProposerList(initial: Iterable<Identity> = []): Map<Identity, Identity> {
  const list = new Map<Identity, Identity>([[SENTINEL_IDENTITY, SENTINEL_IDENTITY]]);
  for (const identity of initial) {
    insertProposer(list, identity);
  }
  return list;
}

export function isProposer(list: ReadonlyMap<Identity, Identity>, identity: Identity): boolean {
  return identity !== SENTINEL_IDENTITY && list.has(identity);
}

/**
 * Insert `identity` at the head of the list.
 *
 * @throws {DelayQueueError} InvalidIdentity for a reserved identity
 * @throws {DelayQueueError} AlreadyRegistered if already present
 */
export function insertProposer(list: Map<Identity, Identity>, identity: Identity): void {
  if (isReservedIdentity(identity)) {
    throw new DelayQueueError(
      DelayErrorCode.InvalidIdentity,
      `Identity '${identity}' is reserved and cannot be a proposer`,
    );
  }
  if (list.has(identity)) {
    throw new DelayQueueError(
      DelayErrorCode.AlreadyRegistered,
      `Proposer already registered: ${identity}`,
    );
  }
  list.set(identity, headOf(list));
  list.set(SENTINEL_IDENTITY, identity);
}

/**
 * Unlink `identity`, given the entry that precedes it.
 *
 * @throws {DelayQueueError} InvalidIdentity for a reserved identity
 * @throws {DelayQueueError} NotRegistered if `identity` is not in the list
 * @throws {DelayQueueError} InvalidPrevious if `prevIdentity` does not point at `identity`
 */
export function removeProposer(
  list: Map<Identity, Identity>,
  prevIdentity: Identity,
  identity: Identity,
): void {
  if (isReservedIdentity(identity)) {
    throw new DelayQueueError(
      DelayErrorCode.InvalidIdentity,
      `Identity '${identity}' is reserved and cannot be a proposer`,
    );
  }
  const successor = list.get(identity);
  if (successor === undefined) {
    throw new DelayQueueError(DelayErrorCode.NotRegistered, `Proposer not registered: ${identity}`);
  }
  if (list.get(prevIdentity) !== identity) {
    throw new DelayQueueError(
      DelayErrorCode.InvalidPrevious,
      `'${prevIdentity}' does not precede '${identity}' in the registry`,
    );
  }
  list.set(prevIdentity, successor);
  list.delete(identity);
}

/**
 * The entry whose successor is `identity` (the sentinel for the head), or
 * undefined if `identity` is not registered.
 */
export function previousProposer(
  list: ReadonlyMap<Identity, Identity>,
  identity: Identity,
): Identity | undefined {
  if (!isProposer(list, identity)) return undefined;
  for (const [from, to] of list) {
    if (to === identity) return from;
  }
  return undefined;
}

/**
 * Read up to `pageSize` proposers following `start`.
 *
 * Pass SENTINEL_IDENTITY to start from the head, and the returned `next`
 * to continue. The traversal is lazy over the list; the list itself is
 * never copied.
 *
 * @throws {DelayQueueError} InvalidPageSize unless pageSize is a positive integer
 * @throws {DelayQueueError} NotRegistered if `start` is neither the sentinel nor registered
 */
export function pageProposers(
  list: ReadonlyMap<Identity, Identity>,
  start: Identity,
  pageSize: number,
): ProposerPage {
  if (!Number.isSafeInteger(pageSize) || pageSize <= 0) {
    throw new DelayQueueError(
      DelayErrorCode.InvalidPageSize,
      `Page size must be a positive integer, got ${pageSize}`,
    );
  }
  if (start !== SENTINEL_IDENTITY && !list.has(start)) {
    throw new DelayQueueError(DelayErrorCode.NotRegistered, `Proposer not registered: ${start}`);
  }

  const identities: Identity[] = [];
  let last: Identity = start;
  let next = list.get(start) ?? SENTINEL_IDENTITY;
  while (next !== SENTINEL_IDENTITY && identities.length < pageSize) {
    identities.push(next);
    last = next;
    next = list.get(next) ?? SENTINEL_IDENTITY;
  }

  return {
    identities,
    next: next === SENTINEL_IDENTITY ? SENTINEL_IDENTITY : last,
  };
}

/** All proposers in traversal order. */
export function listProposers(list: ReadonlyMap<Identity, Identity>): ReadonlyArray<Identity> {
  const out: Identity[] = [];
  let next = headOf(list);
  while (next !== SENTINEL_IDENTITY) {
    out.push(next);
    next = list.get(next) ?? SENTINEL_IDENTITY;
  }
  return out;
}

function headOf(list: ReadonlyMap<Identity, Identity>): Identity {
  return list.get(SENTINEL_IDENTITY) ?? SENTINEL_IDENTITY;
}
