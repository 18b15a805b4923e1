/**
 * holdback dashboard — full-screen view of the active queue
 *
 * Renders the ink dashboard until the operator presses q. React, ink and the
 * dashboard components are imported only when the command runs.
 */

import { Command } from 'commander';
import { LiveQueueService } from '../tui/services/index.js';
import { handle, openQueue } from './context.js';

export function dashboardCommand(): Command {
  return new Command('dashboard')
    .description('Interactive view of the queue, its proposers and recent events')
    .action(handle('dashboard', async (_options: object, command: Command) => {
      const { record, runtime } = openQueue(command);
      const service = new LiveQueueService(runtime, record);

      const [{ default: React }, { render }, { DashboardView }] = await Promise.all([
        import('react'),
        import('ink'),
        import('../tui/dashboard/DashboardView.js'),
      ]);
      const { waitUntilExit } = render(React.createElement(DashboardView, { service }));
      await waitUntilExit();
    }));
}
