/**
 * holdback veto | approve — administrator overrides
 *
 *   holdback veto <new-cursor> [--approve <n>]
 *       Cancel every entry below <new-cursor>. With --approve, then let the
 *       first n entries from the new cursor skip their cooldown.
 *   holdback approve <n>
 *       Let the first n entries from the cursor skip their cooldown. The
 *       count replaces any earlier approval.
 */

import { Command, Option } from 'commander';
import { globalOptions, handle, openQueue, resolveCaller } from './context.js';
import { parseInteger } from './parse.js';

export function vetoCommand(): Command {
  return new Command('veto')
    .description('Cancel entries up to a new cursor (administrator only)')
    .argument('<new-cursor>', 'first slot that survives', parseInteger)
    .addOption(new Option('--approve <n>', 'approve n entries from the new cursor').argParser(parseInteger))
    .action(handle('veto', async (newCursor: number, options: { approve?: number }, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      const { approve } = options;
      const { before, after, approved } = await openQueue(command).runtime.run((queue) => {
        const cursor = queue.cursor;
        if (approve === undefined) {
          queue.vetoUpTo(caller, newCursor);
        } else {
          queue.vetoUpToAndApprove(caller, newCursor, approve);
        }
        return { before: cursor, after: queue.cursor, approved: queue.approvedCount };
      });
      // eslint-disable-next-line no-console
      console.log(`Vetoed ${after - before} entries; cursor is now ${after}.`);
      if (approve !== undefined) {
        // eslint-disable-next-line no-console
        console.log(`Approved ${approved} entries.`);
      }
    }));
}

export function approveCommand(): Command {
  return new Command('approve')
    .description('Let entries at the cursor skip their cooldown (administrator only)')
    .argument('<n>', 'number of entries from the cursor', parseInteger)
    .action(handle('approve', async (count: number, _options: object, command: Command) => {
      const caller = resolveCaller(globalOptions(command));
      await openQueue(command).runtime.run((queue) => queue.approveNext(caller, count));
      // eslint-disable-next-line no-console
      console.log(`Approved ${count} entries.`);
    }));
}
