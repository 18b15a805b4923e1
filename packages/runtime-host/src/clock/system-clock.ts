/**
 * Holdback Runtime Host — System Clock
 *
 * The kernel's Clock backed by the host's wall clock, in whole seconds.
 */

import type { Clock } from '@holdback/kernel';

export class SystemClock implements Clock {
  now(): number {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * A clock pinned to a given reading. Used by the CLI's `--at` flag to
 * preview entry status at another time, and by tests.
 */
export class FixedClock implements Clock {
  constructor(private readonly seconds: number) {}

  now(): number {
    return this.seconds;
  }
}
