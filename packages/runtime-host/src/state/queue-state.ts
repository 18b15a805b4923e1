/**
 * Holdback Runtime Host — Persisted Queue State
 *
 * The queue snapshot lives at `<queueDir>/state/queue.json`. This module
 * checks the shape of what was read back; the kernel's fromSnapshot() then
 * checks that the values are consistent with each other.
 */

import { DelayErrorCode, DelayQueueError } from '@holdback/kernel';
import type { DelayQueueSnapshot, Identity } from '@holdback/kernel';

export const QUEUE_STATE_FILE = 'queue.json';

/**
 * Narrow parsed JSON to a DelayQueueSnapshot.
 *
 * @throws {DelayQueueError} InvalidSnapshot naming the first field with the wrong shape
 */
export function parseQueueSnapshot(raw: unknown): DelayQueueSnapshot {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return malformed('not an object');
  }
  const doc = Object.fromEntries(Object.entries(raw));

  if (doc['version'] !== 1) return malformed(`unsupported version ${String(doc['version'])}`);

  return {
    version: 1,
    administrator: stringField(doc, 'administrator'),
    avatar: stringField(doc, 'avatar'),
    target: stringField(doc, 'target'),
    cooldown: numberField(doc, 'cooldown'),
    expiration: numberField(doc, 'expiration'),
    cursor: numberField(doc, 'cursor'),
    tail: numberField(doc, 'tail'),
    approved: numberField(doc, 'approved'),
    salt: numberField(doc, 'salt'),
    commitments: arrayField(doc, 'commitments').map((c, i) =>
      typeof c === 'string' ? c : malformed(`commitments[${i}] is not a string`),
    ),
    createdAt: arrayField(doc, 'createdAt').map((t, i) =>
      typeof t === 'number' ? t : malformed(`createdAt[${i}] is not a number`),
    ),
    proposers: arrayField(doc, 'proposers').map((link, i) => parseLink(link, i)),
  };
}

function parseLink(link: unknown, index: number): readonly [Identity, Identity] {
  if (Array.isArray(link) && link.length === 2) {
    const [from, to]: unknown[] = link;
    if (typeof from === 'string' && typeof to === 'string') return [from, to];
  }
  return malformed(`proposers[${index}] is not an [identity, next] pair`);
}

function stringField(doc: Record<string, unknown>, key: string): string {
  const value = doc[key];
  return typeof value === 'string' ? value : malformed(`${key} is not a string`);
}

function numberField(doc: Record<string, unknown>, key: string): number {
  const value = doc[key];
  return typeof value === 'number' ? value : malformed(`${key} is not a number`);
}

function arrayField(doc: Record<string, unknown>, key: string): ReadonlyArray<unknown> {
  const value = doc[key];
  return Array.isArray(value) ? value : malformed(`${key} is not an array`);
}

function malformed(reason: string): never {
  throw new DelayQueueError(DelayErrorCode.InvalidSnapshot, `Malformed queue.json: ${reason}`);
}
