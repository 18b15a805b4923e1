/**
 * Holdback Runtime Host — Queue Runtime
 *
 * Binds a DelayQueue to one queue directory: loads the snapshot, wires the
 * file event sink, the outbox executor and the system clock, runs one
 * operation, and writes the snapshot back.
 *
 * The snapshot is written back in a finally block. A failed execution has
 * already consumed its slot and that must survive the process; for every
 * other failure the kernel has rolled back, so the write is a no-op in
 * content.
 */

import { DelayQueue } from '@holdback/kernel';
import type { Clock, DelayQueueParams, Executor } from '@holdback/kernel';
import type { StateIO } from '../state/state-io.js';
import { QUEUE_STATE_FILE, parseQueueSnapshot } from '../state/queue-state.js';
import { EVENT_LOG_FILE, FileEventSink } from '../logging/file-event-sink.js';
import type { EventLogReadResult } from '../logging/event-log-reader.js';
import { readEventLog } from '../logging/event-log-reader.js';
import type { UlidGenerator } from '../logging/ulid.js';
import { ulid } from '../logging/ulid.js';
import { OutboxExecutor } from '../executor/outbox-executor.js';
import { SystemClock } from '../clock/system-clock.js';

export interface QueueRuntimeOptions {
  readonly stateIO: StateIO;
  /** Defaults to SystemClock. */
  readonly clock?: Clock;
  /** Defaults to an OutboxExecutor on the same StateIO. */
  readonly executor?: Executor;
  /** Event id generator. Defaults to the process-wide ULID generator. */
  readonly newId?: UlidGenerator;
}

export class QueueRuntime {
  private readonly stateIO: StateIO;
  private readonly clock: Clock;
  private readonly executor: Executor;
  private readonly sink: FileEventSink;

  constructor(opts: QueueRuntimeOptions) {
    const newId = opts.newId ?? ulid;
    this.stateIO = opts.stateIO;
    this.clock = opts.clock ?? new SystemClock();
    this.executor = opts.executor ?? new OutboxExecutor(opts.stateIO, newId);
    this.sink = new FileEventSink(opts.stateIO, newId);
  }

  /** True once initialize() has written a snapshot. */
  exists(): boolean {
    return this.stateIO.readJson(QUEUE_STATE_FILE) !== undefined;
  }

  /**
   * Create the queue and persist it. DelaySetup is logged.
   *
   * @throws {Error} If this directory already holds a queue
   * @throws {DelayQueueError} For invalid construction parameters
   */
  initialize(params: DelayQueueParams): DelayQueue {
    if (this.exists()) {
      throw new Error('Queue state already exists in this directory.');
    }
    const queue = DelayQueue.create(params, this.deps());
    this.save(queue);
    return queue;
  }

  /**
   * Restore the queue from disk.
   *
   * @throws {Error} If no queue has been initialized here
   * @throws {DelayQueueError} InvalidSnapshot if queue.json is corrupted
   */
  load(): DelayQueue {
    const raw = this.stateIO.readJson(QUEUE_STATE_FILE);
    if (raw === undefined) {
      throw new Error("Queue state not found. Run 'holdback init' first.");
    }
    return DelayQueue.restore(parseQueueSnapshot(raw), this.deps());
  }

  save(queue: DelayQueue): void {
    this.stateIO.writeJson(QUEUE_STATE_FILE, queue.snapshot());
  }

  /** Load, apply `operation`, and persist, whether or not it throws. */
  async run<T>(operation: (queue: DelayQueue) => T | Promise<T>): Promise<T> {
    const queue = this.load();
    try {
      return await operation(queue);
    } finally {
      this.save(queue);
    }
  }

  readEvents(): EventLogReadResult {
    return readEventLog(this.stateIO.readLogRaw(EVENT_LOG_FILE));
  }

  private deps() {
    return { executor: this.executor, clock: this.clock, sink: this.sink };
  }
}
