/**
 * commands/index.ts — Commander program, configured and returned without .parse().
 *
 * Imported by:
 *   src/bin/holdback.ts   (the `holdback` executable)
 *   test/cli.test.ts      (one fresh program per test)
 */

import { Command } from 'commander';
import { initCommand } from './init.js';
import { queuesCommand } from './queues.js';
import { statusCommand } from './status.js';
import { proposersCommand } from './proposers.js';
import { enqueueCommand, enqueueSecretCommand, hashCommand, proposeCommand } from './submit.js';
import { executeCommand, skipExpiredCommand } from './execute.js';
import { approveCommand, vetoCommand } from './override.js';
import { configCommand } from './config.js';
import { logCommand } from './log.js';
import { dashboardCommand } from './dashboard.js';

export function createProgram(): Command {
  return new Command('holdback')
    .description(
      'Holdback — delayed-execution authorization queue.\n' +
      'Proposed actions wait out a cooldown before they execute; the administrator may veto or approve them first.',
    )
    .version('0.1.0')
    .option('--home <dir>', 'Holdback home directory (default: $HOLDBACK_HOME or ~/.holdback)')
    .option('--persist-home', 'remember --home for later invocations')
    .option('--queue <name-or-id>', 'operate on this queue instead of the active one')
    .option('--as <identity>', 'caller identity (default: $HOLDBACK_IDENTITY)')
    .addCommand(initCommand())
    .addCommand(queuesCommand())
    .addCommand(statusCommand())
    .addCommand(proposersCommand())
    .addCommand(proposeCommand())
    .addCommand(enqueueCommand())
    .addCommand(enqueueSecretCommand())
    .addCommand(hashCommand())
    .addCommand(executeCommand())
    .addCommand(skipExpiredCommand())
    .addCommand(vetoCommand())
    .addCommand(approveCommand())
    .addCommand(configCommand())
    .addCommand(logCommand())
    .addCommand(dashboardCommand());
}
