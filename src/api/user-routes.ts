/**
 * User routes: registration, profiles, password change and subscriptions.
 */

import type { FastifyInstance } from 'fastify';
import type { Pool } from 'pg';

import { requireCaller } from './auth/middleware.ts';
import { ValidationError } from './errors.ts';
import {
  createUser,
  createUserSchema,
  getUser,
  listSubscriptions,
  listUsers,
  setPassword,
  setPasswordSchema,
  subscribe,
  unsubscribe,
} from './users/index.ts';
import { buildPage, parseId, parsePagination, type PaginationQuery } from './utils/pagination.ts';
import { parseOrThrow, singleQueryValue } from './utils/validation.ts';

interface IdParams {
  id: string;
}

interface SubscriptionQuery extends PaginationQuery {
  recipes_limit?: string | string[];
}

export interface UserRoutesOptions {
  pool: Pool;
}

/**
 * Parses the optional `recipes_limit` query parameter.
 */
export function parseRecipesLimit(raw: string | string[] | undefined): number | undefined {
  const value = singleQueryValue('recipes_limit', raw);
  if (value === undefined || value === '') return undefined;
  const limit = parseId(value);
  if (limit === null) {
    throw new ValidationError('recipes_limit must be a positive integer', {
      recipes_limit: ['Enter a positive whole number.'],
    });
  }
  return limit;
}

/**
 * Fastify plugin that registers all /api/users routes.
 */
export async function userRoutesPlugin(app: FastifyInstance, opts: UserRoutesOptions): Promise<void> {
  const { pool } = opts;

  // GET /api/users — paginated, ordered by id
  app.get<{ Querystring: PaginationQuery }>('/api/users', async (req) => {
    const pagination = parsePagination(req.query);
    const { users, total } = await listUsers(pool, req.caller, pagination);
    return buildPage(req.url, pagination, total, users);
  });

  // POST /api/users — registration, open to anonymous callers
  app.post('/api/users', async (req, reply) => {
    const input = parseOrThrow(createUserSchema, req.body);
    const user = await createUser(pool, input);
    req.log.info({ userId: user.id }, '[Users] Registered user');
    return reply.code(201).send(user);
  });

  // GET /api/users/me
  app.get('/api/users/me', async (req) => {
    const caller = requireCaller(req);
    return getUser(pool, caller, caller.id);
  });

  // POST /api/users/set_password
  app.post('/api/users/set_password', async (req, reply) => {
    const caller = requireCaller(req);
    const input = parseOrThrow(setPasswordSchema, req.body);
    await setPassword(pool, caller, input);
    return reply.code(204).send();
  });

  // GET /api/users/subscriptions — authors the caller follows
  app.get<{ Querystring: SubscriptionQuery }>('/api/users/subscriptions', async (req) => {
    const caller = requireCaller(req);
    const pagination = parsePagination(req.query);
    const recipesLimit = parseRecipesLimit(req.query.recipes_limit);
    const { authors, total } = await listSubscriptions(pool, caller, pagination, recipesLimit);
    return buildPage(req.url, pagination, total, authors);
  });

  // GET /api/users/:id
  app.get<{ Params: IdParams }>('/api/users/:id', async (req, reply) => {
    const caller = requireCaller(req);
    const id = parseId(req.params.id);
    if (id === null) return reply.code(400).send({ error: 'Invalid user ID' });
    return getUser(pool, caller, id);
  });

  // POST /api/users/:id/subscribe
  app.post<{ Params: IdParams; Querystring: SubscriptionQuery }>('/api/users/:id/subscribe', async (req, reply) => {
    const caller = requireCaller(req);
    const id = parseId(req.params.id);
    if (id === null) return reply.code(400).send({ error: 'Invalid user ID' });
    const recipesLimit = parseRecipesLimit(req.query.recipes_limit);
    const author = await subscribe(pool, caller, id, recipesLimit);
    return reply.code(201).send(author);
  });

  // DELETE /api/users/:id/subscribe
  app.delete<{ Params: IdParams }>('/api/users/:id/subscribe', async (req, reply) => {
    const caller = requireCaller(req);
    const id = parseId(req.params.id);
    if (id === null) return reply.code(400).send({ error: 'Invalid user ID' });
    await unsubscribe(pool, caller, id);
    return reply.code(204).send();
  });
}
