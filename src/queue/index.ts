/**
 * Queue module exports
 */

export { JobQueue, jobIdFor, type PopulateOptions, type PopulateResult } from './job-queue.js';
export {
  parseQueueFile,
  parseJsonQueue,
  formatQueueFile,
  type QueueEntry,
  type JsonQueueEntry,
} from './queue-file.js';
