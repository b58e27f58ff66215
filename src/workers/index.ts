/**
 * Workers Module
 *
 * Background reconciliation sweep over the BullMQ queue.
 */

export { createSweepProcessor, type SweepJob, type SweepDependencies } from './reconciliationWorker';
export {
  RECONCILIATION_SWEEP_QUEUE_NAME,
  createRedisConnection,
  createSweepQueue,
  createQueueSweepScheduler,
  setupSweepWorker,
  type SweepJobData,
  type SweepResult,
  type SweepScheduler,
} from './reconciliation.queue';
