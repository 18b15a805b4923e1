/**
 * holdback status — show the active queue
 *
 * Displays the administrator, the timing policy, the counters, the number of
 * registered proposers, and every entry from the cursor to the tail with its
 * status at the given time (default: now).
 */

import { Command, Option } from 'commander';
import { SystemClock } from '@holdback/runtime-host';
import { summarizeQueue } from '../tui/services/index.js';
import { formatStatus } from '../tui/output/status.js';
import { handle, openQueue, printJson } from './context.js';
import { parseTimestamp } from './parse.js';

export function statusCommand(): Command {
  return new Command('status')
    .description('Show queue configuration, counters and pending entries')
    .addOption(
      new Option('--at <time>', 'evaluate entry status at this time (seconds or ISO 8601)').argParser(
        parseTimestamp,
      ),
    )
    .option('--json', 'Output as JSON')
    .action(handle('status', (options: { at?: number; json?: boolean }, command: Command) => {
      const { record, runtime } = openQueue(command);
      const now = options.at ?? new SystemClock().now();
      const summary = summarizeQueue(runtime.load(), record, now);

      if (options.json === true) {
        printJson(summary);
        return;
      }
      process.stdout.write(formatStatus(summary));
    }));
}
