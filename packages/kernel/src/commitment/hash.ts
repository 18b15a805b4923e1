/**
 * Holdback Kernel — Commitment Hashing
 *
 * A commitment binds the full parameters of an action so the queue can hold
 * a 32-byte placeholder instead of the action itself. Proposers compute the
 * same function client-side to build the value they enqueue; the execution
 * gate recomputes it from the revealed parameters.
 *
 * Encoding: SHA-256 over a canonical JSON object with sorted keys. `value`
 * is written as a decimal string (JSON has no bigint). A `kind` field keeps
 * transparent and secret commitments in disjoint spaces, so a secret
 * commitment can never be replayed as a transparent one or vice versa.
 *
 * Pure functions. node:crypto is used only for hashing.
 */

import { createHash } from 'node:crypto';
import type { CallType, CommitmentHash, QueuedAction } from '../types/action.js';
import type { Identity } from '../types/identity.js';
import { DelayErrorCode, DelayQueueError } from '../types/errors.js';

const COMMITMENT_PATTERN = /^[0-9a-f]{64}$/;

/** Commitment for a transparent enqueue. */
export function commitmentHash(
  to: Identity,
  value: bigint,
  payload: string,
  callType: CallType,
): CommitmentHash {
  return digest({
    kind: 'transparent',
    to,
    value: value.toString(10),
    payload,
    callType,
  });
}

/** Commitment for a secret enqueue; `salt` is the queue's salt counter at enqueue time. */
export function secretCommitmentHash(
  to: Identity,
  value: bigint,
  payload: string,
  callType: CallType,
  salt: number,
): CommitmentHash {
  return digest({
    kind: 'secret',
    to,
    value: value.toString(10),
    payload,
    callType,
    salt,
  });
}

export function hashAction(action: QueuedAction): CommitmentHash {
  return commitmentHash(action.to, action.value, action.payload, action.callType);
}

export function hashSecretAction(action: QueuedAction, salt: number): CommitmentHash {
  return secretCommitmentHash(action.to, action.value, action.payload, action.callType, salt);
}

/**
 * Accept an externally supplied commitment (CLI argument, persisted state).
 * Leading `0x` and upper-case hex are normalized away.
 *
 * @throws {DelayQueueError} InvalidCommitment unless the input is 32 bytes of hex
 */
export function toCommitmentHash(raw: string): CommitmentHash {
  const normalized = (raw.startsWith('0x') ? raw.slice(2) : raw).toLowerCase();
  if (!COMMITMENT_PATTERN.test(normalized)) {
    throw new DelayQueueError(
      DelayErrorCode.InvalidCommitment,
      `Commitment must be 64 hex characters, got '${raw}'`,
    );
  }
  return normalized as CommitmentHash;
}

// ---------------------------------------------------------------------------
// Internal
// ---------------------------------------------------------------------------

type CanonicalValue = string | number | boolean | null | { readonly [key: string]: CanonicalValue };

function digest(fields: { readonly [key: string]: CanonicalValue }): CommitmentHash {
  return createHash('sha256').update(canonicalJson(fields)).digest('hex') as CommitmentHash;
}

/** JSON with object keys sorted at every level. */
function canonicalJson(value: CanonicalValue): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }
  const body = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key] ?? null)}`)
    .join(',');
  return `{${body}}`;
}
