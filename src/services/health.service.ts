import type { HealthCheckResponse, ReadinessResponse } from '../types';
import { env } from '../config';

/**
 * Named dependency probes; each resolves true when the dependency is usable
 */
export type ReadinessChecks = Record<string, () => Promise<boolean>>;

/** A probe that has not answered by then counts as failed */
const PROBE_TIMEOUT_MS = 3000;

const withTimeout = (probe: Promise<boolean>, timeoutMs: number): Promise<boolean> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  return Promise.race([probe, timeout]).finally(() => clearTimeout(timer));
};

/**
 * Process health plus named readiness probes (database, queue)
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor(
    private readonly checks: ReadinessChecks = {},
    private readonly probeTimeoutMs: number = PROBE_TIMEOUT_MS
  ) {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Runs every registered probe; ready only when all pass
   */
  async checkReadiness(): Promise<ReadinessResponse> {
    const names = Object.keys(this.checks);
    const outcomes = await Promise.all(
      names.map(async (name) => {
        try {
          return await withTimeout(this.checks[name](), this.probeTimeoutMs);
        } catch {
          return false;
        }
      })
    );

    const checks: Record<string, boolean> = { server: true };
    names.forEach((name, i) => {
      checks[name] = outcomes[i];
    });

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks };
  }
}

export default HealthService;
