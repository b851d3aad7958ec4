import type { FastifyRequest } from 'fastify';
import type { Pool } from 'pg';

import { UnauthenticatedError } from '../errors.ts';
import { verifyAccessToken } from './jwt.ts';

// Augment Fastify request with the caller resolved by the preHandler hook
declare module 'fastify' {
  interface FastifyRequest {
    caller: Caller | null;
  }
}

/** The authenticated user making a request. Anonymous requests carry `null`. */
export interface Caller {
  id: number;
  email: string;
}

/**
 * Outcome of reading the Authorization header:
 * - `anonymous`: no bearer credentials were sent
 * - `invalid`: credentials were sent but did not verify
 * - `identified`: a verified token subject (email)
 */
export type AuthIdentity = { kind: 'anonymous' } | { kind: 'invalid' } | { kind: 'identified'; email: string };

/**
 * Extracts the identity claimed by the request's `Authorization: Bearer <jwt>` header.
 */
export async function getAuthIdentity(req: FastifyRequest): Promise<AuthIdentity> {
  const authHeader = req.headers.authorization;
  if (!authHeader) return { kind: 'anonymous' };
  if (!authHeader.startsWith('Bearer ')) return { kind: 'invalid' };

  const token = authHeader.slice(7);
  if (!token) return { kind: 'invalid' };

  try {
    const payload = await verifyAccessToken(token);
    return { kind: 'identified', email: payload.sub };
  } catch (err) {
    req.log.debug({ err }, '[Auth] Rejected bearer token');
    return { kind: 'invalid' };
  }
}

/**
 * Resolves the request's caller against the user table.
 *
 * @returns The caller, or `null` for anonymous requests.
 * @throws UnauthenticatedError when a token is present but invalid or names an unknown user.
 */
export async function resolveCaller(req: FastifyRequest, pool: Pool): Promise<Caller | null> {
  const identity = await getAuthIdentity(req);
  if (identity.kind === 'anonymous') return null;
  if (identity.kind === 'invalid') throw new UnauthenticatedError('Invalid token');

  const result = await pool.query<{ id: number; email: string }>('SELECT id, email FROM app_user WHERE email = $1', [
    identity.email.toLowerCase(),
  ]);
  const row = result.rows[0];
  if (!row) throw new UnauthenticatedError('Invalid token');

  return { id: row.id, email: row.email };
}

/**
 * Returns the request's caller or throws UnauthenticatedError for anonymous requests.
 */
export function requireCaller(req: FastifyRequest): Caller {
  if (!req.caller) throw new UnauthenticatedError();
  return req.caller;
}
