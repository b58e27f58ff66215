import type { Server } from 'http';
import type { Queue, Worker } from 'bullmq';
import { createApp } from './app';
import { env } from './config';
import { createContainer } from './container';
import { logger, Logging } from './utils';
import {
  createQueueSweepScheduler,
  createRedisConnection,
  createSweepProcessor,
  createSweepQueue,
  setupSweepWorker,
  type SweepJobData,
  type SweepResult,
} from './workers';

/**
 * Start the server
 */
const startServer = async (): Promise<void> => {
  try {
    const connection = createRedisConnection();
    const queue: Queue<SweepJobData, SweepResult> = createSweepQueue(connection);

    const container = await createContainer({
      sweepScheduler: createQueueSweepScheduler(queue),
      readinessChecks: {
        queue: async () => (await queue.client).status === 'ready',
      },
    });

    const worker: Worker<SweepJobData, SweepResult> = setupSweepWorker(
      createSweepProcessor({ store: container.store, index: container.index, engine: container.engine }),
      connection
    );
    logger.info('👷 Reconciliation sweep worker initialized');

    const app = createApp(container);

    const server: Server = app.listen(env.PORT, () => {
      const base = `http://${env.HOST}:${env.PORT}${env.API_PREFIX}`;
      Logging.box(
        '🔗 INTERCOMPANY RECONCILIATION',
        `Mode:    ${env.NODE_ENV}`,
        `API:     ${base}`,
        `Health:  ${base}/health`
      );
      Logging.success(`Server listening on port ${env.PORT}`);
    });

    const closeResources = async (): Promise<void> => {
      await worker.close();
      await queue.close();
      await container.close();
    };

    // Graceful shutdown handlers
    const gracefulShutdown = (signal: string): void => {
      logger.info(`${signal} received. Starting graceful shutdown...`);

      server.close((err) => {
        if (err) {
          logger.error('Error during server shutdown:', err);
          process.exit(1);
        }

        closeResources()
          .then(() => {
            logger.info('Server closed successfully');
            process.exit(0);
          })
          .catch((closeError: unknown) => {
            logger.error('Error while releasing resources:', closeError);
            process.exit(1);
          });
      });

      // Force shutdown after 30 seconds
      setTimeout(() => {
        logger.error('Forced shutdown due to timeout');
        process.exit(1);
      }, 30000).unref();
    };

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => gracefulShutdown('SIGINT'));

    process.on('uncaughtException', (err: Error) => {
      logger.error('Uncaught Exception:', err);
      process.exit(1);
    });

    process.on('unhandledRejection', (reason: unknown) => {
      logger.error('Unhandled Rejection:', reason);
      process.exit(1);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
