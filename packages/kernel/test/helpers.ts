/**
 * Shared fixtures for kernel tests: a manual clock, an executor that
 * records its calls, and an in-memory event sink.
 */

import { CallType, DelayQueue } from '../src/index.js';
import type {
  Clock,
  EventSink,
  ExecutionContext,
  Executor,
  QueueEvent,
  QueuedAction,
} from '../src/index.js';

export const ADMIN = '0xadmin';
export const AVATAR = '0xavatar';
export const TARGET = '0xtarget';
export const PROPOSER = '0xproposer';
export const OUTSIDER = '0xoutsider';

export const START = 1_700_000_000;

export class ManualClock implements Clock {
  constructor(public time: number = START) {}

  now(): number {
    return this.time;
  }

  advance(seconds: number): void {
    this.time += seconds;
  }
}

export class RecordingExecutor implements Executor {
  readonly calls: Array<{ action: QueuedAction; context: ExecutionContext }> = [];
  /** Result of the next calls; an Error is thrown instead of returned. */
  outcome: boolean | Error = true;

  async performCall(action: QueuedAction, context: ExecutionContext): Promise<boolean> {
    this.calls.push({ action, context });
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

export class MemorySink implements EventSink {
  readonly events: QueueEvent[] = [];
  /** When set, append throws it instead of recording. */
  failure: Error | undefined;

  append(event: QueueEvent): void {
    if (this.failure !== undefined) throw this.failure;
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((e) => e.type);
  }
}

export function action(n: number, overrides: Partial<QueuedAction> = {}): QueuedAction {
  return {
    to: `0xdest${n}`,
    value: BigInt(n),
    payload: `0x${n.toString(16).padStart(2, '0')}`,
    callType: CallType.Call,
    ...overrides,
  };
}

export interface Harness {
  readonly queue: DelayQueue;
  readonly clock: ManualClock;
  readonly executor: RecordingExecutor;
  readonly sink: MemorySink;
}

/** A queue administered by ADMIN with PROPOSER registered. */
export function makeQueue(cooldown = 0, expiration = 0): Harness {
  const clock = new ManualClock();
  const executor = new RecordingExecutor();
  const sink = new MemorySink();
  const queue = DelayQueue.create(
    { initiator: ADMIN, administrator: ADMIN, avatar: AVATAR, target: TARGET, cooldown, expiration },
    { executor, clock, sink },
  );
  queue.register(ADMIN, PROPOSER);
  return { queue, clock, executor, sink };
}
