/**
 * Holdback Runtime Host — Outbox Executor
 *
 * Implements the kernel's Executor by handing each cleared action to the
 * avatar's relayer through an append-only outbox: one JSONL line per call
 * in the queue's `logs/outbox.jsonl`. The relayer tails the file and
 * performs the calls; the queue considers the call dispatched once its line
 * is written.
 *
 * Dispatch fails (resolves false) when the action cannot be relayed as
 * written: a payload that is not an even-length 0x hex string, or a negative
 * value.
 */

import type { ExecutionContext, Executor, QueuedAction } from '@holdback/kernel';
import type { StateIO } from '../state/state-io.js';
import type { UlidGenerator } from '../logging/ulid.js';
import { ulid } from '../logging/ulid.js';

export const OUTBOX_FILE = 'outbox.jsonl';

const PAYLOAD_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;

/** One line of outbox.jsonl. */
export interface OutboxEntry {
  readonly dispatch_id: string;
  readonly timestamp: string;
  readonly slot: number;
  readonly commitment: string;
  readonly avatar: string;
  readonly target: string;
  readonly caller: string;
  readonly to: string;
  /** Decimal string. */
  readonly value: string;
  readonly payload: string;
  readonly call_type: string;
}

export class OutboxExecutor implements Executor {
  constructor(
    private readonly stateIO: StateIO,
    private readonly newId: UlidGenerator = ulid,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async performCall(action: QueuedAction, context: ExecutionContext): Promise<boolean> {
    if (!PAYLOAD_PATTERN.test(action.payload) || action.value < 0n) {
      return false;
    }
    const entry: OutboxEntry = {
      dispatch_id: this.newId(),
      timestamp: this.now().toISOString(),
      slot: context.slot,
      commitment: context.commitment,
      avatar: context.avatar,
      target: context.target,
      caller: context.caller,
      to: action.to,
      value: action.value.toString(10),
      payload: action.payload,
      call_type: action.callType,
    };
    this.stateIO.appendLine(OUTBOX_FILE, JSON.stringify(entry));
    return true;
  }
}
