/**
 * Create a user account from the command line.
 * Usage: tsx scripts/seed-user.ts <email> <username> <password> [first_name] [last_name]
 */
import { createPool } from '../src/db.ts';
import { createUser, createUserSchema } from '../src/api/users/index.ts';
import { parseOrThrow } from '../src/api/utils/validation.ts';

async function main(): Promise<void> {
  const [email, username, password, firstName = 'Test', lastName = 'User'] = process.argv.slice(2);
  if (!email || !username || !password) {
    console.error('Usage: tsx scripts/seed-user.ts <email> <username> <password> [first_name] [last_name]');
    process.exit(1);
  }

  const input = parseOrThrow(createUserSchema, {
    email,
    username,
    password,
    first_name: firstName,
    last_name: lastName,
  });

  const pool = createPool();
  try {
    const user = await createUser(pool, input);
    console.log(`[Seed] Created user #${user.id} (${user.email})`);
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error('[Seed] Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
