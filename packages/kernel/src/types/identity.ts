/**
 * Holdback Kernel — Identities
 *
 * An identity names a participant of a delay queue: the administrator, a
 * proposer, the avatar on whose behalf calls are performed, the target they
 * are forwarded to, or the destination of a queued action.
 *
 * Identities are opaque strings. Two values are reserved and never name a
 * participant:
 *
 *   NULL_IDENTITY      — the zero address; also matched by the empty string
 *   SENTINEL_IDENTITY  — head and tail marker of the proposer list
 */

export type Identity = string;

/** The zero identity. Never authorized for anything. */
export const NULL_IDENTITY: Identity = '0x0000000000000000000000000000000000000000';

/**
 * Head and wrap point of the proposer list.
 * A registry is empty when the sentinel points at itself.
 */
export const SENTINEL_IDENTITY: Identity = '0x0000000000000000000000000000000000000001';

/** True for the null identity and the empty string. */
export function isNullIdentity(identity: Identity): boolean {
  return identity === '' || identity === NULL_IDENTITY;
}

/** True for either reserved value. */
export function isReservedIdentity(identity: Identity): boolean {
  return isNullIdentity(identity) || identity === SENTINEL_IDENTITY;
}
