import { access, constants } from 'node:fs/promises';
import type { Pool } from 'pg';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthCheckResult {
  status: HealthStatus;
  latency_ms: number;
  details?: Record<string, unknown>;
}

export interface HealthChecker {
  name: string;
  critical: boolean;
  check(): Promise<HealthCheckResult>;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  components: Record<string, HealthCheckResult>;
}

export class DatabaseHealthChecker implements HealthChecker {
  readonly name = 'database';
  readonly critical = true;

  constructor(private pool: Pool) {}

  async check(): Promise<HealthCheckResult> {
    const start = Date.now();
    try {
      await this.pool.query('SELECT 1');
      return {
        status: 'healthy',
        latency_ms: Date.now() - start,
        details: {
          pool_total: this.pool.totalCount,
          pool_idle: this.pool.idleCount,
          pool_waiting: this.pool.waitingCount,
        },
      };
    } catch {
      return {
        status: 'unhealthy',
        latency_ms: Date.now() - start,
        details: { error: 'Database connection failed' },
      };
    }
  }
}

/**
 * Recipe images are written below the media root; without write access
 * recipe creation fails but reads keep working.
 */
export class MediaStorageHealthChecker implements HealthChecker {
  readonly name = 'media_storage';
  readonly critical = false;

  constructor(private mediaRoot: string) {}

  async check(): Promise<HealthCheckResult> {
    const start = Date.now();
    try {
      await access(this.mediaRoot, constants.W_OK);
      return { status: 'healthy', latency_ms: Date.now() - start };
    } catch {
      return {
        status: 'unhealthy',
        latency_ms: Date.now() - start,
        details: { error: 'Media directory is not writable' },
      };
    }
  }
}

export class HealthCheckRegistry {
  private checkers: HealthChecker[] = [];

  register(checker: HealthChecker): void {
    this.checkers.push(checker);
  }

  async checkAll(): Promise<HealthResponse> {
    const results = await Promise.all(this.checkers.map(async (checker) => [checker, await checker.check()] as const));

    const components: Record<string, HealthCheckResult> = {};
    let overallStatus: HealthStatus = 'healthy';

    for (const [checker, result] of results) {
      components[checker.name] = result;

      if (result.status === 'unhealthy' && checker.critical) {
        overallStatus = 'unhealthy';
      } else if (result.status !== 'healthy' && overallStatus === 'healthy') {
        overallStatus = 'degraded';
      }
    }

    return {
      status: overallStatus,
      timestamp: new Date().toISOString(),
      components,
    };
  }

  async isReady(): Promise<boolean> {
    const critical = this.checkers.filter((checker) => checker.critical);
    const results = await Promise.all(critical.map((checker) => checker.check()));
    return results.every((result) => result.status !== 'unhealthy');
  }
}
