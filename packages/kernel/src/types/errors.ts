/**
 * Holdback Kernel — Error Types
 *
 * Every failure of a queue operation is a named outcome. Operations throw a
 * DelayQueueError whose `code` identifies the outcome; callers branch on the
 * code, never on the message text.
 *
 * Atomicity: a thrown DelayQueueError means no state changed, with exactly
 * one exception: ExecutionFailed. By the time the executor reports failure
 * the cursor has already moved past the slot, and it stays there. Re-enqueue
 * the action to try again.
 */

export enum DelayErrorCode {
  NotAuthorized = 'NotAuthorized',
  InvalidIdentity = 'InvalidIdentity',
  AlreadyRegistered = 'AlreadyRegistered',
  NotRegistered = 'NotRegistered',
  InvalidPrevious = 'InvalidPrevious',
  QueueEmpty = 'QueueEmpty',
  StillInCooldown = 'StillInCooldown',
  Expired = 'Expired',
  HashMismatch = 'HashMismatch',
  /** The only code thrown after state has changed (cursor already advanced). */
  ExecutionFailed = 'ExecutionFailed',
  ZeroApproval = 'ZeroApproval',
  UnknownEntries = 'UnknownEntries',
  NonIncreasingNonce = 'NonIncreasingNonce',
  OutOfRange = 'OutOfRange',
  InvalidExpiration = 'InvalidExpiration',
  InvalidCooldown = 'InvalidCooldown',
  InvalidAvatar = 'InvalidAvatar',
  InvalidTarget = 'InvalidTarget',
  InvalidPageSize = 'InvalidPageSize',
  InvalidCommitment = 'InvalidCommitment',
  InvalidSnapshot = 'InvalidSnapshot',
}

export class DelayQueueError extends Error {
  readonly code: DelayErrorCode;

  constructor(code: DelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DelayQueueError';
    this.code = code;
  }
}

/**
 * Narrow an unknown thrown value to a DelayQueueError, optionally with a
 * specific code.
 */
export function isDelayQueueError(err: unknown, code?: DelayErrorCode): err is DelayQueueError {
  return err instanceof DelayQueueError && (code === undefined || err.code === code);
}
