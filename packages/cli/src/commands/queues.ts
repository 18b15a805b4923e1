/**
 * holdback queues — manage the queues under the home directory
 *
 * Subcommands:
 *   holdback queues list              — list all queues (* = active)
 *   holdback queues use <name-or-id>  — set the active queue
 *   holdback queues current           — show the active queue
 *   holdback queues remove <name-or-id> — delete a queue and its logs
 */

import { Command } from 'commander';
import { deleteQueueRecord, getActiveQueue, listQueues, queueDir, selectQueue } from '@holdback/runtime-host';
import { handle, resolveHome } from './context.js';

function listCommand(): Command {
  return new Command('list')
    .description('List all queues')
    .action(handle('queues list', (_options: object, command: Command) => {
      const home = resolveHome(command);
      const queues = listQueues(home);
      const active = getActiveQueue(home);

      if (queues.length === 0) {
        // eslint-disable-next-line no-console
        console.log("No queues found. Run 'holdback init <name>' to create one.");
        return;
      }

      for (const q of queues) {
        const marker = active?.id === q.id ? ' *' : '  ';
        // eslint-disable-next-line no-console
        console.log(`${marker} ${q.name}  ${q.id}  created=${q.createdAt}`);
      }
      // eslint-disable-next-line no-console
      console.log('\n* = active queue');
    }));
}

function useCommand(): Command {
  return new Command('use')
    .description('Set the active queue')
    .argument('<name-or-id>', 'queue name or id')
    .action(handle('queues use', (nameOrId: string, _options: object, command: Command) => {
      const record = selectQueue(nameOrId, resolveHome(command));
      // eslint-disable-next-line no-console
      console.log(`Active queue: ${record.name} (${record.id})`);
    }));
}

function currentCommand(): Command {
  return new Command('current')
    .description('Show the active queue')
    .action(handle('queues current', (_options: object, command: Command) => {
      const home = resolveHome(command);
      const record = getActiveQueue(home);
      if (record === null) {
        // eslint-disable-next-line no-console
        console.log('No active queue.');
        return;
      }
      // eslint-disable-next-line no-console
      console.log(`Active queue: ${record.name}`);
      // eslint-disable-next-line no-console
      console.log(`  id:         ${record.id}`);
      // eslint-disable-next-line no-console
      console.log(`  created_at: ${record.createdAt}`);
      // eslint-disable-next-line no-console
      console.log(`  state_dir:  ${queueDir(record.id, home)}`);
    }));
}

function removeCommand(): Command {
  return new Command('remove')
    .description('Delete a queue, its state and its logs')
    .argument('<name-or-id>', 'queue name or id')
    .action(handle('queues remove', (nameOrId: string, _options: object, command: Command) => {
      const record = deleteQueueRecord(nameOrId, resolveHome(command));
      // eslint-disable-next-line no-console
      console.log(`Removed queue: ${record.name} (${record.id})`);
    }));
}

export function queuesCommand(): Command {
  return new Command('queues')
    .description('Manage the queues under the Holdback home directory')
    .addCommand(listCommand())
    .addCommand(useCommand())
    .addCommand(currentCommand())
    .addCommand(removeCommand());
}
