import Fastify, { type FastifyInstance } from 'fastify';
import fastifyStatic from '@fastify/static';
import rateLimit from '@fastify/rate-limit';
import { mkdirSync } from 'node:fs';
import type { Pool } from 'pg';

import { createPool } from '../db.ts';
import { resolveCaller } from './auth/middleware.ts';
import { getServerConfig } from './config.ts';
import { apiErrorHandler } from './errors.ts';
import { DatabaseHealthChecker, HealthCheckRegistry, MediaStorageHealthChecker } from './health.ts';
import { LocalImageStore, MEDIA_URL_PREFIX, type ImageStore } from './images/index.ts';
import { recipeRoutesPlugin } from './recipe-routes.ts';
import { referenceRoutesPlugin } from './reference-routes.ts';
import { userRoutesPlugin } from './user-routes.ts';

export type RecipeApiOptions = {
  logger?: boolean;
  /** Database pool. When omitted the server creates one and closes it on shutdown. */
  pool?: Pool;
  /** Image store. Defaults to a LocalImageStore below MEDIA_ROOT. */
  images?: ImageStore;
};

export function buildServer(options: RecipeApiOptions = {}): FastifyInstance {
  const config = getServerConfig();

  // Base64 data URIs inflate images by a third, so JSON bodies need headroom
  // beyond the raw upload limit.
  const app = Fastify({
    logger: options.logger ?? false,
    bodyLimit: Math.ceil(config.maxFileSizeBytes * 1.4) + 64 * 1024,
  });

  const pool = options.pool ?? createPool();
  const ownsPool = options.pool === undefined;

  mkdirSync(config.mediaRoot, { recursive: true });
  const images = options.images ?? new LocalImageStore(config.mediaRoot);

  if (config.rateLimit.enabled) {
    app.register(rateLimit, {
      max: config.rateLimit.max,
      timeWindow: config.rateLimit.timeWindowMs,
      addHeaders: {
        'x-ratelimit-limit': true,
        'x-ratelimit-remaining': true,
        'x-ratelimit-reset': true,
        'retry-after': true,
      },
      onExceeded: (req, key) => {
        req.log.warn(`[RateLimit] Client exceeded limit: ${key} - ${req.method} ${req.url}`);
      },
      errorResponseBuilder: (_req, context) => ({
        statusCode: 429,
        error: 'Too Many Requests',
        message: `Rate limit exceeded. Try again in ${Math.ceil(context.ttl / 1000)} seconds.`,
      }),
    });
  }

  app.register(fastifyStatic, {
    root: config.mediaRoot,
    prefix: MEDIA_URL_PREFIX,
    decorateReply: false,
  });

  // Resolve the caller once per request; handlers pass it on explicitly
  app.decorateRequest('caller', null);
  app.addHook('preHandler', async (req) => {
    req.caller = await resolveCaller(req, pool);
  });

  app.setErrorHandler(apiErrorHandler);
  app.setNotFoundHandler((_req, reply) => reply.code(404).send({ error: 'Not found' }));

  app.get('/health', async () => ({ ok: true }));

  // Health check endpoints (Kubernetes-compatible)
  const healthRegistry = new HealthCheckRegistry();
  healthRegistry.register(new DatabaseHealthChecker(pool));
  healthRegistry.register(new MediaStorageHealthChecker(config.mediaRoot));

  // Liveness probe - instant, no I/O, always 200
  app.get('/api/health/live', async () => ({ status: 'ok' }));

  // Readiness probe - checks critical dependencies
  app.get('/api/health/ready', async (_req, reply) => {
    const ready = await healthRegistry.isReady();
    if (ready) {
      return { status: 'ok' };
    }
    return reply.code(503).send({ status: 'unavailable' });
  });

  // Detailed health status for monitoring
  app.get('/api/health', async (_req, reply) => {
    const health = await healthRegistry.checkAll();
    const statusCode = health.status === 'unhealthy' ? 503 : 200;
    return reply.code(statusCode).send(health);
  });

  app.register(referenceRoutesPlugin, { pool });
  app.register(userRoutesPlugin, { pool });
  app.register(recipeRoutesPlugin, { pool, images, maxFileSizeBytes: config.maxFileSizeBytes });

  app.addHook('onClose', async () => {
    if (ownsPool) {
      await pool.end();
    }
  });

  return app;
}
