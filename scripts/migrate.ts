/**
 * Apply or roll back schema migrations.
 * Usage: tsx scripts/migrate.ts [up|down] [steps]
 */
import { createPool } from '../src/db.ts';
import { runMigrations } from '../src/migrate.ts';

function parseArgs(args: string[]): { direction: 'up' | 'down'; steps?: number } {
  const direction = args[0] ?? 'up';
  if (direction !== 'up' && direction !== 'down') {
    throw new Error(`Unknown direction "${direction}" (expected up or down)`);
  }
  const steps = args[1] ? parseInt(args[1], 10) : undefined;
  if (steps !== undefined && (!Number.isInteger(steps) || steps < 1)) {
    throw new Error(`Invalid steps "${args[1]}"`);
  }
  return { direction, steps };
}

async function main(): Promise<void> {
  const { direction, steps } = parseArgs(process.argv.slice(2));
  const pool = createPool();
  try {
    const summary = await runMigrations(pool, direction, steps);
    console.log(`[Migrate] ${summary}`);
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error('[Migrate] Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
