import { describe, it, expect } from 'vitest';

import { HealthCheckRegistry, type HealthChecker, type HealthStatus } from './health.ts';

function checker(name: string, critical: boolean, status: HealthStatus): HealthChecker {
  return { name, critical, check: async () => ({ status, latency_ms: 0 }) };
}

describe('HealthCheckRegistry', () => {
  it('is healthy when every component is', async () => {
    const registry = new HealthCheckRegistry();
    registry.register(checker('database', true, 'healthy'));
    registry.register(checker('media_storage', false, 'healthy'));

    const health = await registry.checkAll();

    expect(health.status).toBe('healthy');
    expect(Object.keys(health.components)).toEqual(['database', 'media_storage']);
  });

  it('degrades when a non-critical component fails', async () => {
    const registry = new HealthCheckRegistry();
    registry.register(checker('database', true, 'healthy'));
    registry.register(checker('media_storage', false, 'unhealthy'));

    expect((await registry.checkAll()).status).toBe('degraded');
    expect(await registry.isReady()).toBe(true);
  });

  it('is unhealthy and not ready when a critical component fails', async () => {
    const registry = new HealthCheckRegistry();
    registry.register(checker('database', true, 'unhealthy'));
    registry.register(checker('media_storage', false, 'healthy'));

    expect((await registry.checkAll()).status).toBe('unhealthy');
    expect(await registry.isReady()).toBe(false);
  });
});
