/**
 * @holdback/cli
 *
 * Programmatic access to the `holdback` command tree and its output
 * helpers. The executable lives in src/bin/holdback.ts.
 */

export { createProgram } from './commands/index.js';
export { formatError, resolveCaller } from './commands/context.js';
export type { GlobalOptions } from './commands/context.js';
export type { EntrySummary, EventSummary, IQueueService, QueueSummary } from './tui/services/index.js';
export { LiveQueueService, describeEvent, summarizeQueue } from './tui/services/index.js';
export { formatStatus } from './tui/output/status.js';
export { formatEvents, formatProposers } from './tui/output/events.js';
