/**
 * Holdback Kernel — Queue Snapshots
 *
 * Conversion between the live DelayQueueState and its JSON-safe snapshot.
 * fromSnapshot() accepts untrusted input (a file read by the runtime host)
 * and rejects anything that would break a queue invariant.
 */

import type { CommitmentHash } from '../types/action.js';
import type { Identity } from '../types/identity.js';
import { SENTINEL_IDENTITY, isNullIdentity } from '../types/identity.js';
import type { DelayQueueSnapshot, DelayQueueState } from '../types/state.js';
import { MIN_EXPIRATION_SECONDS } from '../types/state.js';
import { DelayErrorCode, DelayQueueError, isDelayQueueError } from '../types/errors.js';
import { toCommitmentHash } from '../commitment/hash.js';

export const SNAPSHOT_VERSION = 1;

export function toSnapshot(state: DelayQueueState): DelayQueueSnapshot {
  const proposers: Array<readonly [Identity, Identity]> = [];
  let from = SENTINEL_IDENTITY;
  do {
    const to = state.proposers.get(from) ?? SENTINEL_IDENTITY;
    proposers.push([from, to]);
    from = to;
  } while (from !== SENTINEL_IDENTITY);

  return {
    version: SNAPSHOT_VERSION,
    administrator: state.administrator,
    avatar: state.avatar,
    target: state.target,
    cooldown: state.cooldown,
    expiration: state.expiration,
    cursor: state.cursor,
    tail: state.tail,
    approved: state.approved,
    salt: state.salt,
    commitments: [...state.commitments],
    createdAt: [...state.createdAt],
    proposers,
  };
}

/**
 * Rebuild queue state from a snapshot.
 *
 * @throws {DelayQueueError} InvalidSnapshot describing the first violation found
 */
export function fromSnapshot(snapshot: DelayQueueSnapshot): DelayQueueState {
  if (snapshot.version !== SNAPSHOT_VERSION) {
    invalid(`unsupported version ${String(snapshot.version)}`);
  }
  if (isNullIdentity(snapshot.avatar)) invalid('avatar is null');
  if (isNullIdentity(snapshot.target)) invalid('target is null');

  for (const [name, value] of [
    ['cooldown', snapshot.cooldown],
    ['expiration', snapshot.expiration],
    ['cursor', snapshot.cursor],
    ['tail', snapshot.tail],
    ['approved', snapshot.approved],
    ['salt', snapshot.salt],
  ] as const) {
    if (!Number.isSafeInteger(value) || value < 0) {
      invalid(`${name} must be a non-negative integer, got ${String(value)}`);
    }
  }
  if (snapshot.expiration !== 0 && snapshot.expiration < MIN_EXPIRATION_SECONDS) {
    invalid(`expiration ${snapshot.expiration} is below ${MIN_EXPIRATION_SECONDS}`);
  }
  if (snapshot.cursor > snapshot.tail) invalid('cursor is beyond tail');
  if (snapshot.approved > snapshot.tail - snapshot.cursor) {
    invalid('approved count exceeds pending entries');
  }
  if (snapshot.commitments.length !== snapshot.tail || snapshot.createdAt.length !== snapshot.tail) {
    invalid('entry arrays do not match tail');
  }

  const commitments: CommitmentHash[] = snapshot.commitments.map((raw, slot) => {
    try {
      return toCommitmentHash(raw);
    } catch (err) {
      if (isDelayQueueError(err, DelayErrorCode.InvalidCommitment)) {
        invalid(`slot ${slot}: ${err.message}`);
      }
      throw err;
    }
  });
  const createdAt = snapshot.createdAt.map((at, slot) => {
    if (!Number.isSafeInteger(at) || at < 0) invalid(`slot ${slot}: bad timestamp`);
    return at;
  });

  return {
    administrator: snapshot.administrator,
    avatar: snapshot.avatar,
    target: snapshot.target,
    cooldown: snapshot.cooldown,
    expiration: snapshot.expiration,
    cursor: snapshot.cursor,
    tail: snapshot.tail,
    approved: snapshot.approved,
    salt: snapshot.salt,
    commitments,
    createdAt,
    proposers: rebuildProposers(snapshot.proposers),
  };
}

/**
 * The links must walk from the sentinel back to the sentinel, visiting
 * every link exactly once.
 */
function rebuildProposers(
  links: ReadonlyArray<readonly [Identity, Identity]>,
): Map<Identity, Identity> {
  const list = new Map<Identity, Identity>();
  for (const [from, to] of links) {
    if (list.has(from)) invalid(`proposer '${from}' appears twice`);
    if (from !== SENTINEL_IDENTITY && isNullIdentity(from)) invalid('null proposer');
    list.set(from, to);
  }

  let steps = 0;
  let at = list.get(SENTINEL_IDENTITY);
  if (at === undefined) invalid('proposer list has no sentinel');
  while (at !== SENTINEL_IDENTITY) {
    steps++;
    if (at === undefined || steps > list.size) invalid('proposer list is not a single cycle');
    at = list.get(at);
  }
  if (steps + 1 !== list.size) invalid('proposer list has unreachable entries');
  return list;
}

function invalid(reason: string): never {
  throw new DelayQueueError(DelayErrorCode.InvalidSnapshot, `Invalid queue snapshot: ${reason}`);
}
