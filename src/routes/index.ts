import { Router } from 'express';
import { HealthController } from '../controllers';
import type { AppContainer } from '../container';
import { createHealthRoutes } from './health.routes';
import { createReconciliationRoutes } from './reconciliation.routes';
import { createTransactionRoutes } from './transactions.routes';

export function createRoutes(container: AppContainer): Router {
  const router = Router();

  // Health check routes
  router.use('/health', createHealthRoutes(new HealthController(container.health)));

  // Ingestion, lookup and manual reconciliation
  router.use(
    '/transactions',
    createTransactionRoutes({
      gateway: container.gateway,
      engine: container.engine,
      transactions: container.transactions,
      uploadsDir: container.uploadsDir,
    })
  );

  // Summary and background sweeps
  router.use(
    '/reconciliation',
    createReconciliationRoutes({
      transactions: container.transactions,
      sweepScheduler: container.sweepScheduler,
    })
  );

  return router;
}

export default createRoutes;
