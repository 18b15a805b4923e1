/**
 * Holdback Runtime Host — Event Log Reader
 *
 * Pure function for reading `events.jsonl` with dedupe-on-read.
 *
 * Guarantees:
 *   - parse every valid line; drop malformed lines (counted in parseErrors)
 *   - deduplicate by event_id, first occurrence wins (counted in duplicates)
 *   - content not ending in '\n' has a partial trailing line; it is dropped
 *     and flagged
 *   - more than one timestamp regression in file order flags outOfOrder
 *   - output is sorted by (timestamp, event_id)
 *
 * No I/O. Callers obtain the raw content via StateIO.readLogRaw().
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoggedEvent {
  /** 26-character ULID, the deduplication key. */
  readonly event_id: string;
  readonly event_type: string;
  /** ISO 8601. */
  readonly timestamp: string;
  /** Queue clock reading, seconds. */
  readonly at: number;
  /** Every other field of the line, bigints still as decimal strings. */
  readonly fields: Readonly<Record<string, unknown>>;
}

export interface EventLogStats {
  /** Non-empty complete lines processed. */
  readonly totalLines: number;
  /** Events kept after deduplication. */
  readonly parsedEvents: number;
  readonly duplicates: number;
  /** Lines that were not JSON or lacked a required field. */
  readonly parseErrors: number;
  readonly partialTrailingLine: boolean;
  /** True if more than one timestamp regression was seen in file order. */
  readonly outOfOrder: boolean;
}

export interface EventLogReadResult {
  readonly events: ReadonlyArray<LoggedEvent>;
  readonly stats: EventLogStats;
}

const HEADER_FIELDS = new Set(['event_id', 'event_type', 'timestamp', 'at']);

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function readEventLog(rawContent: string): EventLogReadResult {
  const partialTrailingLine = rawContent.length > 0 && !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  const lines = (partialTrailingLine ? rawLines.slice(0, -1) : rawLines).filter(
    (l) => l.length > 0,
  );

  let duplicates = 0;
  let parseErrors = 0;
  const seen = new Set<string>();
  const inFileOrder: LoggedEvent[] = [];

  for (const line of lines) {
    const event = parseLine(line);
    if (event === null) {
      parseErrors++;
      continue;
    }
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    inFileOrder.push(event);
  }

  let regressions = 0;
  let previous: string | undefined;
  for (const event of inFileOrder) {
    if (previous !== undefined && event.timestamp < previous) regressions++;
    previous = event.timestamp;
  }

  const events = [...inFileOrder].sort((a, b) => {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    if (a.event_id === b.event_id) return 0;
    return a.event_id < b.event_id ? -1 : 1;
  });

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
      outOfOrder: regressions > 1,
    },
  };
}

function parseLine(line: string): LoggedEvent | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;

  const record = Object.fromEntries(Object.entries(parsed));
  const { event_id, event_type, timestamp, at } = record;
  if (
    typeof event_id !== 'string' ||
    typeof event_type !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof at !== 'number'
  ) {
    return null;
  }

  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!HEADER_FIELDS.has(key)) fields[key] = value;
  }
  return { event_id, event_type, timestamp, at, fields };
}
