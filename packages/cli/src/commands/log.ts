/**
 * holdback log — read the queue's event log
 *
 * Events are read from logs/events.jsonl with dedupe-on-read. Malformed,
 * duplicate and partial lines are skipped and reported after the listing.
 */

import { Command, Option } from 'commander';
import { describeEvent } from '../tui/services/index.js';
import { formatEvents } from '../tui/output/events.js';
import { t } from '../tui/theme.js';
import { handle, openQueue, printJson } from './context.js';
import { parseInteger } from './parse.js';

interface LogOptions {
  limit: number;
  type?: string;
  json?: boolean;
}

export function logCommand(): Command {
  return new Command('log')
    .description('Show recent queue events')
    .addOption(
      new Option('--limit <n>', 'maximum number of events, most recent last').argParser(parseInteger).default(20),
    )
    .option('--type <event-type>', 'only events of this type (e.g. TransactionExecuted)')
    .option('--json', 'Output as JSON')
    .action(handle('log', (options: LogOptions, command: Command) => {
      const { events, stats } = openQueue(command).runtime.readEvents();
      const matching = options.type === undefined ? events : events.filter((e) => e.event_type === options.type);
      const recent = matching.slice(Math.max(0, matching.length - options.limit));

      if (options.json === true) {
        printJson({ events: recent, stats });
        return;
      }

      process.stdout.write(formatEvents(recent.map(describeEvent)));
      const skipped: string[] = [];
      if (stats.parseErrors > 0) skipped.push(`${stats.parseErrors} malformed`);
      if (stats.duplicates > 0) skipped.push(`${stats.duplicates} duplicate`);
      if (stats.partialTrailingLine) skipped.push('1 partial');
      if (skipped.length > 0) {
        process.stdout.write('\n  ' + t.amber(`skipped lines: ${skipped.join(', ')}`) + '\n');
      }
    }));
}
