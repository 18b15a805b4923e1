/**
 * Holdback Runtime Host — StateIO Contract Tests
 *
 * Both implementations must agree on:
 *
 *   SIO-1: readJson returns undefined for a missing or unparseable file
 *   SIO-2: writeJson then readJson round-trips through JSON
 *   SIO-3: readLogRaw returns '' for a missing log
 *   SIO-4: appendLine output reads back as 'line\n' per line
 *
 * Isolation: MemoryStateIO tests have no I/O. FileStateIO tests use temp dirs.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';
import type { StateIO } from '../src/state/state-io.js';

function tempQueueDir(): string {
  return mkdtempSync(join(tmpdir(), 'holdback-sio-'));
}

const implementations: ReadonlyArray<{ name: string; make: () => StateIO }> = [
  { name: 'MemoryStateIO', make: () => new MemoryStateIO() },
  { name: 'FileStateIO', make: () => new FileStateIO(tempQueueDir()) },
];

describe.each(implementations)('$name', ({ make }) => {
  it('SIO-1: readJson returns undefined for a file never written', () => {
    expect(make().readJson('queue.json')).toBeUndefined();
  });

  it('SIO-2: writeJson then readJson round-trips through JSON', () => {
    const io = make();
    io.writeJson('queue.json', { cursor: 2, dropped: undefined, list: [1, 'a'] });
    expect(io.readJson('queue.json')).toEqual({ cursor: 2, list: [1, 'a'] });
  });

  it('SIO-3: readLogRaw returns an empty string for a missing log', () => {
    const io = make();
    io.appendLine('other.jsonl', 'x');
    expect(io.readLogRaw('events.jsonl')).toBe('');
  });

  it('SIO-4: appended lines read back newline-terminated', () => {
    const io = make();
    io.appendLine('events.jsonl', '{"event_id":"A"}');
    io.appendLine('events.jsonl', '{"event_id":"B"}');
    expect(io.readLogRaw('events.jsonl')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
  });
});

describe('FileStateIO layout', () => {
  it('writes state under state/ and logs under logs/', () => {
    const dir = tempQueueDir();
    const io = new FileStateIO(dir);
    io.writeJson('queue.json', { tail: 1 });
    io.appendLine('events.jsonl', 'line');
    expect(JSON.parse(readFileSync(join(dir, 'state', 'queue.json'), 'utf-8'))).toEqual({ tail: 1 });
    expect(readFileSync(join(dir, 'logs', 'events.jsonl'), 'utf-8')).toBe('line\n');
  });

  it('treats a corrupted JSON file as absent', () => {
    const dir = tempQueueDir();
    mkdirSync(join(dir, 'state'));
    writeFileSync(join(dir, 'state', 'queue.json'), '{ not json', 'utf-8');
    expect(new FileStateIO(dir).readJson('queue.json')).toBeUndefined();
  });
});

describe('MemoryStateIO.readLines', () => {
  it('returns appended lines without newlines', () => {
    const io = new MemoryStateIO();
    io.appendLine('outbox.jsonl', 'a');
    io.appendLine('outbox.jsonl', 'b');
    expect(io.readLines('outbox.jsonl')).toEqual(['a', 'b']);
    expect(io.readLines('events.jsonl')).toEqual([]);
  });
});
