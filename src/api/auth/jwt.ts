import { createHash, randomUUID } from 'node:crypto';
import { SignJWT, jwtVerify, errors as joseErrors } from 'jose';

/** JWT payload returned by verifyAccessToken. */
export interface JwtPayload {
  /** Subject: the user's email address. */
  sub: string;
  /** Issued-at timestamp (seconds since epoch). */
  iat: number;
  /** Expiration timestamp (seconds since epoch). */
  exp: number;
  /** Unique token identifier (UUID v4). */
  jti: string;
  /** Key ID, identifies which secret signed this token. */
  kid: string;
}

/** Options for signAccessToken. */
export interface SignOptions {
  /** Lifetime in seconds. Defaults to 24 hours. */
  ttlSeconds?: number;
}

const ALG = 'HS256' as const;
const TOKEN_TTL_SECONDS = 24 * 60 * 60;
const CLOCK_TOLERANCE_SECONDS = 30;
const MIN_SECRET_BYTES = 32;

/**
 * Derives a short, deterministic key ID from a secret.
 * Uses SHA-256 of the first 8 bytes, truncated to 8 hex characters.
 */
export function deriveKid(secret: string): string {
  const hash = createHash('sha256').update(secret.slice(0, 8)).digest('hex');
  return hash.slice(0, 8);
}

/** Encodes a secret string into a Uint8Array for jose. */
function encodeSecret(secret: string): Uint8Array {
  return new TextEncoder().encode(secret);
}

/**
 * Validates that a secret meets the minimum length requirement.
 * Throws if the secret is missing or too short.
 */
function requireSecret(secret: string | undefined): asserts secret is string {
  if (!secret || secret.trim().length === 0) {
    throw new Error('[JWT] JWT_SECRET is not set. Set the JWT_SECRET environment variable (minimum 32 bytes).');
  }
  if (Buffer.byteLength(secret, 'utf-8') < MIN_SECRET_BYTES) {
    throw new Error(
      `[JWT] JWT_SECRET must be at least ${MIN_SECRET_BYTES} bytes. ` +
        `Current length: ${Buffer.byteLength(secret, 'utf-8')} bytes.`,
    );
  }
}

/**
 * Signs an HS256 access token for a user.
 *
 * The token carries `sub` (email), `iat`, `exp`, `jti` and a `kid` header for
 * key-rotation support.
 */
export async function signAccessToken(email: string, options?: SignOptions): Promise<string> {
  const secret = process.env.JWT_SECRET;
  requireSecret(secret);

  return new SignJWT({})
    .setProtectedHeader({ alg: ALG, kid: deriveKid(secret) })
    .setSubject(email)
    .setIssuedAt()
    .setExpirationTime(`${options?.ttlSeconds ?? TOKEN_TTL_SECONDS}s`)
    .setJti(randomUUID())
    .sign(encodeSecret(secret));
}

/**
 * Verifies an HS256 access token and returns its payload.
 *
 * Supports key rotation: tries the primary secret first (`JWT_SECRET`),
 * then falls back to `JWT_SECRET_PREVIOUS` if set and the primary fails
 * with a signature-verification error.
 *
 * @throws If the token is invalid, expired (beyond clock skew), or not signed by a known key.
 */
export async function verifyAccessToken(token: string): Promise<JwtPayload> {
  const primary = process.env.JWT_SECRET;
  const previous = process.env.JWT_SECRET_PREVIOUS;

  if (primary) {
    try {
      return await verifyWith(token, primary);
    } catch (err) {
      if (previous && isSignatureError(err)) {
        return verifyWith(token, previous);
      }
      throw err;
    }
  }

  if (previous) {
    return verifyWith(token, previous);
  }

  throw new Error('[JWT] No JWT secret configured for verification.');
}

/**
 * Verifies a token against a specific secret and validates required claims.
 */
async function verifyWith(token: string, secret: string): Promise<JwtPayload> {
  const { payload, protectedHeader } = await jwtVerify(token, encodeSecret(secret), {
    algorithms: [ALG],
    clockTolerance: CLOCK_TOLERANCE_SECONDS,
    requiredClaims: ['sub', 'iat', 'exp', 'jti'],
  });

  if (typeof protectedHeader.kid !== 'string') {
    throw new Error('[JWT] Missing kid in token header');
  }

  const { sub, iat, exp, jti } = payload;
  if (typeof sub !== 'string' || typeof iat !== 'number' || typeof exp !== 'number' || typeof jti !== 'string') {
    throw new Error('[JWT] Token is missing required claims');
  }

  return { sub, iat, exp, jti, kid: protectedHeader.kid };
}

/** Returns true if the error is a jose signature verification failure. */
function isSignatureError(err: unknown): boolean {
  return (
    err instanceof joseErrors.JWSSignatureVerificationFailed ||
    (err instanceof Error && err.message.includes('signature verification failed'))
  );
}
