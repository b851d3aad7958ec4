/**
 * Applies and rolls back the numbered SQL migrations in `migrations/`.
 *
 * Files come in `NNN_name.up.sql` / `NNN_name.down.sql` pairs; applied
 * versions are tracked in `schema_migrations`.
 */

import { readFileSync, readdirSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { Pool, PoolClient } from 'pg';

import { withTransaction } from './db.ts';

export const MIGRATIONS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../migrations');

/** Arbitrary constant advisory lock key for this repo. */
const MIGRATION_LOCK_KEY = 51873204;

export interface Migration {
  version: number;
  name: string;
  upPath: string;
  downPath: string;
}

export function parseMigrationFilename(filename: string): { version: number; name: string; direction: 'up' | 'down' } | null {
  const m = filename.match(/^(\d+)_(.+)\.(up|down)\.sql$/);
  if (!m) return null;
  return { version: parseInt(m[1], 10), name: m[2], direction: m[3] === 'up' ? 'up' : 'down' };
}

/**
 * Pairs up/down files by version, sorted ascending.
 *
 * @throws If a version is missing one half of its pair.
 */
export function listMigrations(filenames: string[], dir = MIGRATIONS_DIR): Migration[] {
  const byVersion = new Map<number, { name: string; upPath?: string; downPath?: string }>();

  for (const filename of filenames) {
    const parsed = parseMigrationFilename(filename);
    if (!parsed) continue;

    const entry = byVersion.get(parsed.version) ?? { name: parsed.name };
    const full = path.join(dir, filename);
    if (parsed.direction === 'up') entry.upPath = full;
    else entry.downPath = full;
    byVersion.set(parsed.version, entry);
  }

  return [...byVersion.entries()]
    .map(([version, entry]) => {
      if (!entry.upPath || !entry.downPath) {
        throw new Error(`Migration ${version} missing up/down pair`);
      }
      return { version, name: entry.name, upPath: entry.upPath, downPath: entry.downPath };
    })
    .sort((a, b) => a.version - b.version);
}

async function ensureMigrationsTable(client: PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version bigint PRIMARY KEY,
      applied_at timestamptz NOT NULL DEFAULT now()
    )
  `);
}

async function withAdvisoryLock<T>(pool: Pool, fn: () => Promise<T>): Promise<T> {
  // Session-level lock: hold it on one client for the whole run
  const client = await pool.connect();
  try {
    await client.query('SELECT pg_advisory_lock($1)', [MIGRATION_LOCK_KEY]);
    try {
      await ensureMigrationsTable(client);
      return await fn();
    } finally {
      await client.query('SELECT pg_advisory_unlock($1)', [MIGRATION_LOCK_KEY]);
    }
  } finally {
    client.release();
  }
}

/**
 * Applies pending migrations (`up`) or rolls back the latest `steps` (`down`).
 *
 * @returns A one-line summary.
 */
export async function runMigrations(pool: Pool, direction: 'up' | 'down', steps?: number): Promise<string> {
  const migrations = listMigrations(readdirSync(MIGRATIONS_DIR));

  return withAdvisoryLock(pool, async () => {
    const applied = await pool.query<{ version: number }>(
      'SELECT version::int AS version FROM schema_migrations ORDER BY version DESC',
    );

    if (direction === 'up') {
      const appliedSet = new Set(applied.rows.map((r) => r.version));
      let count = 0;
      for (const m of migrations) {
        if (appliedSet.has(m.version)) continue;
        await withTransaction(pool, async (client) => {
          await client.query(readFileSync(m.upPath, 'utf-8'));
          await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [m.version]);
        });
        console.log(`[Migrate] Applied ${m.version}_${m.name}`);
        count += 1;
      }
      return `applied ${count} up migrations`;
    }

    const toRollback = steps ? applied.rows.slice(0, steps) : applied.rows;
    let count = 0;
    for (const row of toRollback) {
      const m = migrations.find((x) => x.version === row.version);
      if (!m) {
        throw new Error(`No migration files for applied version ${row.version}`);
      }
      await withTransaction(pool, async (client) => {
        await client.query(readFileSync(m.downPath, 'utf-8'));
        await client.query('DELETE FROM schema_migrations WHERE version = $1', [m.version]);
      });
      console.log(`[Migrate] Rolled back ${m.version}_${m.name}`);
      count += 1;
    }
    return `applied ${count} down migrations`;
  });
}
