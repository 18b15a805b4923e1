/**
 * @holdback/kernel
 *
 * Holdback queue engine: proposer registry, commitment hashing, timing
 * policy, execution gate, override protocol, event logger, and adapter
 * interfaces.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, fetch, or any other I/O API.
 * node:crypto is used for commitment hashing (pure computation, not I/O).
 *
 * Concrete adapter implementations and state persistence live in
 * @holdback/runtime-host.
 */

// Types
export * from './types/index.js';

// Adapter interfaces; implementations live in runtime-host
export type { Clock, ExecutionContext, Executor } from './adapters/index.js';

// Event sink interface (implementation lives in runtime-host)
export type { EventSink } from './logging/event-sink.js';

// Implementations
export { EventLogger } from './logging/event-log.js';
export {
  commitmentHash,
  hashAction,
  hashSecretAction,
  secretCommitmentHash,
  toCommitmentHash,
} from './commitment/hash.js';
export {
  createProposerList,
  insertProposer,
  isProposer,
  listProposers,
  pageProposers,
  previousProposer,
  removeProposer,
} from './registry/proposer-registry.js';
export type { ProposerPage } from './registry/proposer-registry.js';
export {
  adjustApprovals,
  classifyEntry,
  countExpiredPrefix,
  enforceTimingPolicy,
  entryView,
  isExpired,
} from './timing/policy.js';
export { SNAPSHOT_VERSION, fromSnapshot, toSnapshot } from './queue/snapshot.js';
export { DelayQueue } from './queue/delay-queue.js';
export type { DelayQueueDeps, DelayQueueParams, ExecutionReceipt } from './queue/delay-queue.js';
