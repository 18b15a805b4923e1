/**
 * @holdback/runtime-host
 *
 * Holdback runtime host — side-effectful implementations of the kernel's
 * collaborators and queue persistence. Depends on @holdback/kernel
 * (interfaces); implements them with Node.js built-ins.
 *
 * No kernel code imports from this package.
 */

// StateIO — queue-scoped I/O abstraction
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// Queue store — several queues per home, one active
export type { QueueIndex, QueueRecord } from './state/queue-store.js';
export {
  createQueueRecord,
  deleteQueueRecord,
  findQueue,
  getActiveQueue,
  listQueues,
  queueDir,
  queueIndexPath,
  queueStateIO,
  selectQueue,
} from './state/queue-store.js';

// Persisted snapshot
export { QUEUE_STATE_FILE, parseQueueSnapshot } from './state/queue-state.js';

// HOLDBACK_HOME resolution with precedence chain
export type { ResolveHomeOptions } from './home.js';
export {
  getOsConfigPath,
  readHomeFromConfig,
  resolveHoldbackHome,
  writeHomeToConfig,
} from './home.js';

// Logging
export type { UlidGenerator, UlidSources } from './logging/ulid.js';
export { createUlidGenerator, encodeCrockford, ulid } from './logging/ulid.js';
export { EVENT_LOG_FILE, FileEventSink, serializeEvent } from './logging/file-event-sink.js';
export type { EventLogReadResult, EventLogStats, LoggedEvent } from './logging/event-log-reader.js';
export { readEventLog } from './logging/event-log-reader.js';

// Collaborators
export { FixedClock, SystemClock } from './clock/system-clock.js';
export type { OutboxEntry } from './executor/outbox-executor.js';
export { OUTBOX_FILE, OutboxExecutor } from './executor/outbox-executor.js';

// Runtime
export type { QueueRuntimeOptions } from './runtime/queue-runtime.js';
export { QueueRuntime } from './runtime/queue-runtime.js';
