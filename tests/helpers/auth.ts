/**
 * JWT authentication helpers for API tests.
 *
 * Uses the same JWT_SECRET set in tests/setup-api.ts to sign tokens
 * that the server's verifyAccessToken() will accept.
 */

import { SignJWT } from 'jose';
import { createHash, randomUUID } from 'node:crypto';

function testSecret(): string {
  return process.env.JWT_SECRET || 'test-secret-for-recipe-api-at-least-32-bytes';
}

/**
 * Sign a short-lived HS256 JWT for test authentication.
 * Mirrors the signAccessToken() shape in src/api/auth/jwt.ts.
 */
export async function signTestJwt(email: string = 'cook@example.com', secret: string = testSecret()): Promise<string> {
  const kid = createHash('sha256').update(secret.slice(0, 8)).digest('hex').slice(0, 8);

  return new SignJWT({})
    .setProtectedHeader({ alg: 'HS256', kid })
    .setSubject(email)
    .setIssuedAt()
    .setExpirationTime('15m')
    .setJti(randomUUID())
    .sign(new TextEncoder().encode(secret));
}

/**
 * Build an Authorization header object for use with app.inject().
 *
 * Usage:
 *   const res = await app.inject({
 *     method: 'GET',
 *     url: '/api/users/me',
 *     headers: await getAuthHeaders('cook@example.com'),
 *   });
 */
export async function getAuthHeaders(email: string = 'cook@example.com'): Promise<Record<string, string>> {
  const token = await signTestJwt(email);
  return { authorization: `Bearer ${token}` };
}
