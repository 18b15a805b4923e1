/**
 * Holdback Kernel — Event Sink Interface
 *
 * The injection point for queue event persistence. The kernel owns the
 * contract; concrete sinks (FileEventSink) live in the runtime host and are
 * injected when a queue is created or restored. The kernel never writes to
 * disk itself.
 */

import type { QueueEvent } from '../types/events.js';

/**
 * Receives queue events in the order they were emitted.
 *
 * append() is called only after the operation that produced the event has
 * committed. Events from an operation that threw (other than
 * ExecutionFailed) are never delivered.
 */
export interface EventSink {
  append(event: QueueEvent): void;
}
