import type { ErrorCode } from '../utils/AppError';

/**
 * Envelope for every JSON response
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  code?: ErrorCode;
  timestamp: string;
}

export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}

export interface ReadinessResponse {
  ready: boolean;
  /** One entry per probe, always including `server` */
  checks: Record<string, boolean>;
}
