import { Pool, type PoolClient, type PoolConfig } from 'pg';
import { existsSync } from 'fs';

function defaultHost(): string {
  // When running inside the devcontainer/docker-compose network, Postgres is reachable
  // via the service name. Keep localhost for non-container local dev.
  return existsSync('/.dockerenv') ? 'postgres' : 'localhost';
}

export function createPool(config?: PoolConfig): Pool {
  return new Pool({
    host: process.env.PGHOST || defaultHost(),
    port: parseInt(process.env.PGPORT || '5432', 10),
    user: process.env.PGUSER || 'recipes',
    password: process.env.PGPASSWORD || 'recipes',
    database: process.env.PGDATABASE || 'recipes',
    ...config,
  });
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated pooled client.
 * Any error thrown by `fn` rolls the transaction back and is rethrown.
 */
export async function withTransaction<T>(pool: Pool, fn: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}
