/**
 * Holdback Kernel — Event Logger
 *
 * Buffers the events of one operation and forwards them to the injected
 * sink when the operation commits. A rolled-back operation discards its
 * buffer, so the audit trail only ever shows state changes that happened.
 *
 * The sink is optional: when omitted (tests, embedded use) events are
 * still buffered and committed, but go nowhere.
 */

import type { QueueEvent } from '../types/events.js';
import type { EventSink } from './event-sink.js';

export class EventLogger {
  private pending: QueueEvent[] = [];

  constructor(private readonly sink?: EventSink) {}

  /** Stage an event for the current operation. */
  record(event: QueueEvent): void {
    this.pending.push(event);
  }

  /** Deliver staged events to the sink, in order. */
  commit(): void {
    const events = this.pending;
    this.pending = [];
    for (const event of events) {
      this.sink?.append(event);
    }
  }

  /** Drop staged events. */
  discard(): void {
    this.pending = [];
  }
}
