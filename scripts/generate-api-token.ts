#!/usr/bin/env node
/**
 * Issue an access token for an existing user.
 *
 * Usage:
 *   JWT_SECRET=<secret> npm run generate-api-token -- <email> [--ttl <seconds>]
 *
 * Environment:
 *   JWT_SECRET (required) — the same HS256 secret used by the API server.
 */

import { signAccessToken } from '../src/api/auth/jwt.ts';

function parseArgs(args: string[]): { email?: string; ttlSeconds?: number } {
  let email: string | undefined;
  let ttlSeconds: number | undefined;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--ttl' && args[i + 1]) {
      ttlSeconds = parseInt(args[i + 1], 10);
      i++;
    } else if (!email) {
      email = args[i];
    }
  }

  return { email, ttlSeconds };
}

async function main(): Promise<void> {
  if (!process.env.JWT_SECRET) {
    console.error('Error: JWT_SECRET environment variable is required.');
    console.error('Set it to the same secret used by your API server.');
    process.exit(1);
  }

  const { email, ttlSeconds } = parseArgs(process.argv.slice(2));
  if (!email) {
    console.error('Usage: JWT_SECRET=<secret> npm run generate-api-token -- <email> [--ttl <seconds>]');
    process.exit(1);
  }

  const token = await signAccessToken(email.toLowerCase(), { ttlSeconds });

  console.error(`Subject: ${email.toLowerCase()}`);
  console.error('');
  console.log(token);
}

main().catch((err: unknown) => {
  console.error('Failed to generate token:', err instanceof Error ? err.message : err);
  process.exit(1);
});
