/**
 * Holdback Runtime Host — Queue Store Tests
 *
 *   QS-1: the first queue created becomes active
 *   QS-2: names are unique and validated
 *   QS-3: selectQueue accepts a name or an id
 *   QS-4: a corrupted index reads as empty
 *
 * Isolation: every test gets its own temp home directory.
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  createQueueRecord,
  deleteQueueRecord,
  findQueue,
  getActiveQueue,
  listQueues,
  queueDir,
  queueIndexPath,
  queueStateIO,
  selectQueue,
} from '../src/state/queue-store.js';

function tempHome(): string {
  return mkdtempSync(join(tmpdir(), 'holdback-qs-'));
}

const FIXED_NOW = () => new Date('2026-01-01T00:00:00.000Z');

describe('queue store', () => {
  it('QS-1: the first queue created becomes active', () => {
    const home = tempHome();
    expect(getActiveQueue(home)).toBeNull();

    const treasury = createQueueRecord('treasury', home, FIXED_NOW);
    createQueueRecord('ops', home, FIXED_NOW);

    expect(getActiveQueue(home)).toEqual(treasury);
    expect(listQueues(home).map((q) => q.name)).toEqual(['treasury', 'ops']);
    expect(treasury.createdAt).toBe('2026-01-01T00:00:00.000Z');
  });

  it('writes metadata.json into the queue directory', () => {
    const home = tempHome();
    const record = createQueueRecord('treasury', home, FIXED_NOW);
    const metadata: unknown = JSON.parse(
      readFileSync(join(queueDir(record.id, home), 'metadata.json'), 'utf-8'),
    );
    expect(metadata).toEqual(record);
  });

  it('QS-2: rejects duplicate and malformed names', () => {
    const home = tempHome();
    createQueueRecord('treasury', home);
    expect(() => createQueueRecord('treasury', home)).toThrow("A queue named 'treasury' already exists.");
    expect(() => createQueueRecord('Bad Name', home)).toThrow(/^Invalid queue name 'Bad Name'/);
    expect(listQueues(home)).toHaveLength(1);
  });

  it('QS-3: selects by name or id', () => {
    const home = tempHome();
    createQueueRecord('treasury', home);
    const ops = createQueueRecord('ops', home);

    expect(selectQueue('ops', home)).toEqual(ops);
    expect(getActiveQueue(home)?.name).toBe('ops');
    selectQueue(listQueues(home)[0]?.id ?? '', home);
    expect(getActiveQueue(home)?.name).toBe('treasury');
    expect(findQueue(ops.id, home)).toEqual(ops);
    expect(() => selectQueue('missing', home)).toThrow(/^Queue not found: missing\./);
  });

  it('QS-4: a corrupted index reads as empty', () => {
    const home = tempHome();
    mkdirSync(join(home, 'queues'), { recursive: true });
    writeFileSync(queueIndexPath(home), '{"activeQueueId": 7, "queues": [{"id": 1}]}', 'utf-8');
    expect(listQueues(home)).toEqual([]);
    expect(getActiveQueue(home)).toBeNull();
  });

  it('scopes StateIO to the queue directory', () => {
    const home = tempHome();
    const record = createQueueRecord('treasury', home);
    queueStateIO(record.id, home).appendLine('events.jsonl', 'x');
    expect(existsSync(join(home, 'queues', record.id, 'logs', 'events.jsonl'))).toBe(true);
  });
});

describe('deleteQueueRecord', () => {
  it('removes the queue directory and hands activity to the oldest remaining queue', () => {
    const home = tempHome();
    const treasury = createQueueRecord('treasury', home);
    const ops = createQueueRecord('ops', home);

    expect(deleteQueueRecord('treasury', home)).toEqual(treasury);

    expect(existsSync(queueDir(treasury.id, home))).toBe(false);
    expect(listQueues(home)).toEqual([ops]);
    expect(getActiveQueue(home)).toEqual(ops);
  });

  it('leaves the active queue alone when another one is deleted', () => {
    const home = tempHome();
    const treasury = createQueueRecord('treasury', home);
    createQueueRecord('ops', home);
    deleteQueueRecord('ops', home);
    expect(getActiveQueue(home)).toEqual(treasury);
  });

  it('rejects an unknown queue', () => {
    expect(() => deleteQueueRecord('missing', tempHome())).toThrow('Queue not found: missing.');
  });
});
