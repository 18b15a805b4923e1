/**
 * Holdback Runtime Host — File-backed Event Sink
 *
 * Implements the EventSink interface from @holdback/kernel by appending one
 * JSONL line per queue event to the queue's `logs/events.jsonl`.
 *
 * Line shape:
 *   { event_id, timestamp, event_type, at, ...event fields }
 *
 * `timestamp` is the ISO 8601 form of the event's clock reading, so the log
 * sorts the same way the queue saw time. Bigints (action values) are written
 * as decimal strings.
 *
 * The write is synchronous: when append() returns the line is on disk.
 */

import type { EventSink, QueueEvent } from '@holdback/kernel';
import type { StateIO } from '../state/state-io.js';
import type { UlidGenerator } from './ulid.js';
import { ulid } from './ulid.js';

export const EVENT_LOG_FILE = 'events.jsonl';

export class FileEventSink implements EventSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly newId: UlidGenerator = ulid,
  ) {}

  append(event: QueueEvent): void {
    this.stateIO.appendLine(EVENT_LOG_FILE, serializeEvent(event, this.newId()));
  }
}

/** One JSONL line for `event`. */
export function serializeEvent(event: QueueEvent, eventId: string): string {
  const { type, ...fields } = event;
  return JSON.stringify(
    {
      event_id: eventId,
      timestamp: new Date(event.at * 1000).toISOString(),
      event_type: type,
      ...fields,
    },
    (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString(10) : value),
  );
}
