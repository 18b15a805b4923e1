/**
 * Holdback Kernel — Type Exports
 *
 * Re-exports all kernel types from a single entry point.
 * No logic lives in this file.
 */

export type { Identity } from './identity.js';
export { NULL_IDENTITY, SENTINEL_IDENTITY, isNullIdentity, isReservedIdentity } from './identity.js';

export type { CommitmentHash, QueuedAction } from './action.js';
export { CALL_TYPES, CallType, parseCallType } from './action.js';

export { DelayErrorCode, DelayQueueError, isDelayQueueError } from './errors.js';

export type {
  AdministrationTransferredEvent,
  CooldownSetEvent,
  DelaySetupEvent,
  ExpirationSetEvent,
  ExpiredSkippedEvent,
  ProposerDeregisteredEvent,
  ProposerRegisteredEvent,
  QueueEvent,
  QueueEventType,
  SecretTransactionAddedEvent,
  TransactionAddedEvent,
  TransactionExecutedEvent,
  TransactionsApprovedEvent,
  TransactionsVetoedEvent,
} from './events.js';

export type {
  DelayQueueSnapshot,
  DelayQueueState,
  EntryStatus,
  QueueEntryView,
} from './state.js';
export { MIN_EXPIRATION_SECONDS } from './state.js';
