/**
 * Holdback Runtime Host — Queue Store
 *
 * A home directory can hold several independent delay queues. Each has its
 * own state and log directories; one of them is active and is the target of
 * every CLI command that does not name a queue.
 *
 * State layout:
 *   <home>/queues/index.json              — queue registry + active queue ID
 *   <home>/queues/<id>/metadata.json      — queue record (id, name, createdAt)
 *   <home>/queues/<id>/state/             — queue.json
 *   <home>/queues/<id>/logs/              — events.jsonl, outbox.jsonl
 */

import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { FileStateIO, isNodeError } from './state-io.js';

// ---------------------------------------------------------------------------
// Queue record types
// ---------------------------------------------------------------------------

export interface QueueRecord {
  /** UUIDv4. Immutable after creation. */
  readonly id: string;
  /** Unique, human-readable name chosen at creation time. */
  readonly name: string;
  /** ISO 8601 creation timestamp. */
  readonly createdAt: string;
}

/**
 * `activeQueueId` is the id of a queue in `queues`, or null before the first
 * queue is created.
 */
export interface QueueIndex {
  readonly activeQueueId: string | null;
  /** In creation order. */
  readonly queues: ReadonlyArray<QueueRecord>;
}

const QUEUE_NAME_PATTERN = /^[a-z0-9][a-z0-9._-]{0,63}$/;

// ---------------------------------------------------------------------------
// Path helpers
// ---------------------------------------------------------------------------

export function queueIndexPath(home: string): string {
  return join(home, 'queues', 'index.json');
}

export function queueDir(queueId: string, home: string): string {
  return join(home, 'queues', queueId);
}

/** The StateIO scoped to one queue's directory. */
export function queueStateIO(queueId: string, home: string): FileStateIO {
  return new FileStateIO(queueDir(queueId, home));
}

// ---------------------------------------------------------------------------
// Index read/write (internal)
// ---------------------------------------------------------------------------

const EMPTY_INDEX: QueueIndex = { activeQueueId: null, queues: [] };

function readQueueIndex(home: string): QueueIndex {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(queueIndexPath(home), 'utf-8'));
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT') || err instanceof SyntaxError) {
      return EMPTY_INDEX;
    }
    throw err;
  }
  return parseQueueIndex(parsed);
}

function writeQueueIndex(home: string, index: QueueIndex): void {
  mkdirSync(join(home, 'queues'), { recursive: true });
  writeFileSync(queueIndexPath(home), JSON.stringify(index, null, 2), 'utf-8');
}

/** Keep the well-formed records of a parsed index; anything else reads as empty. */
function parseQueueIndex(raw: unknown): QueueIndex {
  if (typeof raw !== 'object' || raw === null) return EMPTY_INDEX;
  const queues: QueueRecord[] = [];
  if ('queues' in raw && Array.isArray(raw.queues)) {
    for (const entry of raw.queues) {
      const record = parseQueueRecord(entry);
      if (record !== null) queues.push(record);
    }
  }
  const active = 'activeQueueId' in raw ? raw.activeQueueId : null;
  const activeQueueId =
    typeof active === 'string' && queues.some((q) => q.id === active) ? active : null;
  return { activeQueueId, queues };
}

function parseQueueRecord(raw: unknown): QueueRecord | null {
  if (typeof raw !== 'object' || raw === null) return null;
  if (!('id' in raw) || !('name' in raw) || !('createdAt' in raw)) return null;
  const { id, name, createdAt } = raw;
  if (typeof id !== 'string' || typeof name !== 'string' || typeof createdAt !== 'string') {
    return null;
  }
  return { id, name, createdAt };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Register a new queue directory. The first queue created becomes active.
 *
 * @throws {Error} If the name is malformed or already taken
 */
export function createQueueRecord(
  name: string,
  home: string,
  now: () => Date = () => new Date(),
): QueueRecord {
  if (!QUEUE_NAME_PATTERN.test(name)) {
    throw new Error(
      `Invalid queue name '${name}': use lowercase letters, digits, '.', '_' or '-'.`,
    );
  }
  const index = readQueueIndex(home);
  if (index.queues.some((q) => q.name === name)) {
    throw new Error(`A queue named '${name}' already exists.`);
  }

  const record: QueueRecord = { id: randomUUID(), name, createdAt: now().toISOString() };
  const dir = queueDir(record.id, home);
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, 'metadata.json'), JSON.stringify(record, null, 2), 'utf-8');

  writeQueueIndex(home, {
    activeQueueId: index.activeQueueId ?? record.id,
    queues: [...index.queues, record],
  });
  return record;
}

export function listQueues(home: string): ReadonlyArray<QueueRecord> {
  return readQueueIndex(home).queues;
}

/** The active queue, or null before any queue exists. */
export function getActiveQueue(home: string): QueueRecord | null {
  const index = readQueueIndex(home);
  return index.queues.find((q) => q.id === index.activeQueueId) ?? null;
}

/** Look a queue up by exact id or name. */
export function findQueue(nameOrId: string, home: string): QueueRecord | null {
  return listQueues(home).find((q) => q.id === nameOrId || q.name === nameOrId) ?? null;
}

/**
 * Make a queue the active one.
 *
 * @throws {Error} If no queue has that id or name
 */
export function selectQueue(nameOrId: string, home: string): QueueRecord {
  const index = readQueueIndex(home);
  const record = index.queues.find((q) => q.id === nameOrId || q.name === nameOrId);
  if (record === undefined) {
    throw new Error(
      `Queue not found: ${nameOrId}. Use 'holdback queues list' to see available queues.`,
    );
  }
  writeQueueIndex(home, { ...index, activeQueueId: record.id });
  return record;
}

/**
 * Delete a queue and everything under its directory. If it was active, the
 * oldest remaining queue becomes active.
 *
 * @throws {Error} If no queue has that id or name
 */
export function deleteQueueRecord(nameOrId: string, home: string): QueueRecord {
  const index = readQueueIndex(home);
  const record = index.queues.find((q) => q.id === nameOrId || q.name === nameOrId);
  if (record === undefined) {
    throw new Error(`Queue not found: ${nameOrId}.`);
  }
  const queues = index.queues.filter((q) => q.id !== record.id);
  const activeQueueId =
    index.activeQueueId === record.id ? (queues[0]?.id ?? null) : index.activeQueueId;
  writeQueueIndex(home, { activeQueueId, queues });
  rmSync(queueDir(record.id, home), { recursive: true, force: true });
  return record;
}
