/**
 * Holdback Kernel — Queue Events
 *
 * Every successful state change emits exactly one event (a failed execution
 * emits one too, since its cursor advance is kept). Events are the audit
 * trail of a queue: the runtime host appends them to `events.jsonl`.
 *
 * `at` is the clock reading (seconds) of the operation that emitted it.
 */

import type { CallType, CommitmentHash } from './action.js';
import type { Identity } from './identity.js';

export interface DelaySetupEvent {
  readonly type: 'DelaySetup';
  readonly at: number;
  readonly initiator: Identity;
  readonly administrator: Identity;
  readonly avatar: Identity;
  readonly target: Identity;
}

export interface ProposerRegisteredEvent {
  readonly type: 'ProposerRegistered';
  readonly at: number;
  readonly proposer: Identity;
}

export interface ProposerDeregisteredEvent {
  readonly type: 'ProposerDeregistered';
  readonly at: number;
  readonly proposer: Identity;
}

/**
 * A transparent entry was appended. The action fields are present only when
 * the proposer handed the queue the full action (`propose()`); `enqueue()`
 * only ever sees the hash.
 */
export interface TransactionAddedEvent {
  readonly type: 'TransactionAdded';
  readonly at: number;
  readonly slot: number;
  readonly commitment: CommitmentHash;
  readonly proposer: Identity;
  readonly action?: {
    readonly to: Identity;
    readonly value: bigint;
    readonly payload: string;
    readonly callType: CallType;
  };
}

export interface SecretTransactionAddedEvent {
  readonly type: 'SecretTransactionAdded';
  readonly at: number;
  readonly slot: number;
  readonly commitment: CommitmentHash;
  readonly proposer: Identity;
  /** Opaque off-queue reference. Recorded, never interpreted. */
  readonly note: string;
  /** The salt value this entry consumed. */
  readonly salt: number;
}

export interface TransactionExecutedEvent {
  readonly type: 'TransactionExecuted';
  readonly at: number;
  readonly slot: number;
  readonly commitment: CommitmentHash;
  readonly caller: Identity;
  readonly success: boolean;
}

export interface TransactionsVetoedEvent {
  readonly type: 'TransactionsVetoed';
  readonly at: number;
  readonly fromCursor: number;
  readonly count: number;
}

export interface TransactionsApprovedEvent {
  readonly type: 'TransactionsApproved';
  readonly at: number;
  readonly cursor: number;
  readonly count: number;
}

export interface ExpiredSkippedEvent {
  readonly type: 'ExpiredSkipped';
  readonly at: number;
  readonly fromCursor: number;
  readonly count: number;
  readonly caller: Identity;
}

export interface CooldownSetEvent {
  readonly type: 'CooldownSet';
  readonly at: number;
  readonly cooldown: number;
}

export interface ExpirationSetEvent {
  readonly type: 'ExpirationSet';
  readonly at: number;
  readonly expiration: number;
}

export interface AdministrationTransferredEvent {
  readonly type: 'AdministrationTransferred';
  readonly at: number;
  readonly previous: Identity;
  readonly next: Identity;
}

export type QueueEvent =
  | DelaySetupEvent
  | ProposerRegisteredEvent
  | ProposerDeregisteredEvent
  | TransactionAddedEvent
  | SecretTransactionAddedEvent
  | TransactionExecutedEvent
  | TransactionsVetoedEvent
  | TransactionsApprovedEvent
  | ExpiredSkippedEvent
  | CooldownSetEvent
  | ExpirationSetEvent
  | AdministrationTransferredEvent;

export type QueueEventType = QueueEvent['type'];
