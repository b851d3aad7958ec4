/**
 * Server configuration read from environment variables.
 */

import path from 'node:path';

export interface RateLimitConfig {
  enabled: boolean;
  max: number;
  timeWindowMs: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  /** Directory decoded recipe images are written to and served from. */
  mediaRoot: string;
  maxFileSizeBytes: number;
  rateLimit: RateLimitConfig;
}

export const DEFAULT_MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024;

let cachedConfig: ServerConfig | null = null;

function intFromEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export function getServerConfig(): ServerConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = {
    port: intFromEnv('PORT', 3000),
    host: process.env.HOST || '::',
    mediaRoot: path.resolve(process.env.MEDIA_ROOT || 'media'),
    maxFileSizeBytes: intFromEnv('MAX_FILE_SIZE_BYTES', DEFAULT_MAX_FILE_SIZE_BYTES),
    rateLimit: {
      // Skip rate limiting in test environment or when explicitly disabled
      enabled: process.env.NODE_ENV !== 'test' && process.env.RATE_LIMIT_DISABLED !== 'true',
      max: intFromEnv('RATE_LIMIT_MAX', 100),
      timeWindowMs: intFromEnv('RATE_LIMIT_WINDOW_MS', 60000),
    },
  };

  return cachedConfig;
}

/**
 * Clear cached config (for testing).
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
