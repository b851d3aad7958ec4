/**
 * Read-only reference data routes: /api/tags and /api/ingredients.
 * Both listings are open to anonymous callers and unpaginated.
 */

import type { FastifyInstance } from 'fastify';
import type { Pool } from 'pg';

import { getIngredient, listIngredients } from './ingredients/index.ts';
import { getTag, listTags } from './tags/index.ts';
import { parseId } from './utils/pagination.ts';
import { singleQueryValue } from './utils/validation.ts';

interface IdParams {
  id: string;
}

interface IngredientListQuery {
  name?: string | string[];
}

export interface ReferenceRoutesOptions {
  pool: Pool;
}

/**
 * Fastify plugin that registers the tag and ingredient routes.
 *
 * Usage:
 * ```ts
 * app.register(referenceRoutesPlugin, { pool });
 * ```
 */
export async function referenceRoutesPlugin(app: FastifyInstance, opts: ReferenceRoutesOptions): Promise<void> {
  const { pool } = opts;

  // GET /api/tags
  app.get('/api/tags', async () => listTags(pool));

  // GET /api/tags/:id
  app.get<{ Params: IdParams }>('/api/tags/:id', async (req, reply) => {
    const id = parseId(req.params.id);
    if (id === null) return reply.code(400).send({ error: 'Invalid tag ID' });
    return getTag(pool, id);
  });

  // GET /api/ingredients?name=<prefix>
  app.get<{ Querystring: IngredientListQuery }>('/api/ingredients', async (req) =>
    listIngredients(pool, singleQueryValue('name', req.query.name)),
  );

  // GET /api/ingredients/:id
  app.get<{ Params: IdParams }>('/api/ingredients/:id', async (req, reply) => {
    const id = parseId(req.params.id);
    if (id === null) return reply.code(400).send({ error: 'Invalid ingredient ID' });
    return getIngredient(pool, id);
  });
}
