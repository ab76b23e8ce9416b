export {
  PendingQueue,
  DEFAULT_MAX_RETRY_ATTEMPTS,
  type DrainResult,
  type PendingQueueOptions,
} from './pending-queue.js';
export { SyncEngine, type SyncEngineOptions, type SyncReport } from './sync-engine.js';
