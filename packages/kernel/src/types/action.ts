/**
 * Holdback Kernel — Action Types
 *
 * A queued action is the call the avatar performs once its queue entry
 * clears the timing policy. The queue never stores actions themselves,
 * only a commitment hash over their fields (see commitment/hash.ts).
 */

import type { Identity } from './identity.js';

// ---------------------------------------------------------------------------
// Call Type
// ---------------------------------------------------------------------------

/**
 * How the executor performs the call against `to`.
 *
 * The queue does not interpret the call type; it is bound into the
 * commitment and forwarded to the executor unchanged.
 */
export enum CallType {
  Call = 'call',
  DelegateCall = 'delegatecall',
}

export const CALL_TYPES: ReadonlyArray<CallType> = [CallType.Call, CallType.DelegateCall];

/** Narrow an arbitrary string (e.g. a CLI flag) to a CallType. */
export function parseCallType(raw: string): CallType | undefined {
  return CALL_TYPES.find((t) => t === raw);
}

// ---------------------------------------------------------------------------
// Queued Action
// ---------------------------------------------------------------------------

/**
 * The parameters of a call routed through the queue.
 *
 * `payload` is a 0x-prefixed hex string of call data; `0x` means empty.
 * `value` is an amount in the avatar's smallest unit.
 */
export interface QueuedAction {
  readonly to: Identity;
  readonly value: bigint;
  readonly payload: string;
  readonly callType: CallType;
}

// ---------------------------------------------------------------------------
// Commitment Hash
// ---------------------------------------------------------------------------

declare const __commitmentHashBrand: unique symbol;

/**
 * Lowercase hex SHA-256 digest binding a QueuedAction (and, in secret mode,
 * a salt). Only commitment/hash.ts produces values of this type; strings
 * from outside the kernel go through `toCommitmentHash()`.
 */
export type CommitmentHash = string & {
  readonly [__commitmentHashBrand]: 'CommitmentHash';
};
