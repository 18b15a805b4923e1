export { LiveQueueService, allProposers, describeEvent, summarizeQueue } from './LiveQueueService.js'

export type {
  IQueueService,
  QueueSummary,
  EntrySummary,
  EventSummary,
} from './IQueueService.js'
