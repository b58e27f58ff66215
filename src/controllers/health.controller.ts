import { Request, Response } from 'express';
import type { HealthService } from '../services/health.service';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Probe endpoints for the orchestrator. `/ready` answers 503 with the failing
 * checks so a rollout can tell which dependency is down.
 */
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, this.healthService.getHealthStatus(), 'Service is healthy');
  });

  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const readiness = await this.healthService.checkReadiness();

    if (!readiness.ready) {
      sendError(res, 'Service is not ready', 503, {
        code: 'SERVICE_UNAVAILABLE',
        data: readiness,
      });
      return;
    }

    sendSuccess(res, readiness, 'Service is ready');
  });

  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export default HealthController;
