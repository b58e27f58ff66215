import { Queue, Worker, type ConnectionOptions, type Job } from 'bullmq';
import { env } from '../config';
import { AppError, logger } from '../utils';

// ============================================
// Job Contracts
// ============================================

export const RECONCILIATION_SWEEP_QUEUE_NAME = 'reconciliation-sweep';

const SWEEP_JOB_NAME = 'sweep-pending';

export interface SweepJobData {
  requestedAt: string;
  requestedBy: string;
}

export interface SweepResult {
  processed: number;
  matched: number;
  pending: number;
  skipped: number;
}

/**
 * Anything that can schedule a sweep of pending transactions
 */
export interface SweepScheduler {
  enqueueSweep(requestedBy: string): Promise<string>;
}

// ============================================
// Redis Connection for BullMQ
// ============================================

export function createRedisConnection(): ConnectionOptions {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    // BullMQ requires maxRetriesPerRequest to be null
    maxRetriesPerRequest: null,
  };
}

// ============================================
// Queue Definition
// ============================================

export function createSweepQueue(
  connection: ConnectionOptions = createRedisConnection()
): Queue<SweepJobData, SweepResult> {
  const queue = new Queue<SweepJobData, SweepResult>(RECONCILIATION_SWEEP_QUEUE_NAME, {
    connection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: 'exponential',
        delay: 1000,
      },
      removeOnComplete: true,
      removeOnFail: false,
    },
  });

  queue.on('error', (err) => {
    logger.error(`Sweep queue error: ${err.message}`);
  });

  return queue;
}

export function createQueueSweepScheduler(queue: Queue<SweepJobData, SweepResult>): SweepScheduler {
  return {
    async enqueueSweep(requestedBy: string): Promise<string> {
      const job = await queue.add(SWEEP_JOB_NAME, {
        requestedAt: new Date().toISOString(),
        requestedBy,
      });

      if (!job.id) {
        throw AppError.internal('Sweep job was enqueued without an id');
      }

      logger.info(`[Job ${job.id}] Sweep enqueued by ${requestedBy}`);
      return job.id;
    },
  };
}

// ============================================
// Worker Setup
// ============================================

export function setupSweepWorker(
  processor: (job: Job<SweepJobData, SweepResult>) => Promise<SweepResult>,
  connection: ConnectionOptions = createRedisConnection()
): Worker<SweepJobData, SweepResult> {
  const worker = new Worker<SweepJobData, SweepResult>(RECONCILIATION_SWEEP_QUEUE_NAME, processor, {
    connection,
    concurrency: env.SWEEP_CONCURRENCY,
    // A full sweep can take a while on a large backlog
    lockDuration: 60000,
  });

  worker.on('completed', (job, result) => {
    logger.info(
      `[Job ${job.id}] Sweep completed: ${result.matched} matched, ${result.pending} still pending`
    );
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.id}] Sweep failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Worker error: ${err.message}`);
  });

  return worker;
}
