/**
 * User service: registration, lookup, passwords and author subscriptions.
 */

import type { Pool } from 'pg';

import type { Caller } from '../auth/middleware.ts';
import { hashPassword, verifyPassword } from '../auth/passwords.ts';
import { NotFoundError, ValidationError } from '../errors.ts';
import type { RecipeSummary, RecipeSummaryRow } from '../recipes/types.ts';
import { toRecipeSummary } from '../recipes/views.ts';
import type { Pagination } from '../utils/pagination.ts';
import { isUniqueViolation } from '../utils/pg-errors.ts';
import { VIEWS, type FollowViewBuilder } from '../views.ts';
import type {
  CreatedUserView,
  CreateUserInput,
  FollowView,
  ListSubscriptionsResult,
  ListUsersResult,
  SetPasswordInput,
  UserRow,
  UserView,
} from './types.ts';

/** User columns plus whether `$1` (caller id or NULL) follows them. */
const USER_SELECT = `
  SELECT u.id, u.email, u.username, u.first_name, u.last_name,
         EXISTS (SELECT 1 FROM follow f WHERE f.user_id = $1 AND f.author_id = u.id) AS is_subscribed
  FROM app_user u`;

/**
 * Lists users ordered by id.
 */
export async function listUsers(pool: Pool, caller: Caller | null, pagination: Pagination): Promise<ListUsersResult> {
  const [dataResult, countResult] = await Promise.all([
    pool.query<UserRow>(`${USER_SELECT} ORDER BY u.id LIMIT $2 OFFSET $3`, [
      caller?.id ?? null,
      pagination.limit,
      pagination.offset,
    ]),
    pool.query<{ total: string }>('SELECT COUNT(*) AS total FROM app_user'),
  ]);

  return {
    users: dataResult.rows.map((row) => VIEWS.user.list(row, caller)),
    total: parseInt(countResult.rows[0]?.total ?? '0', 10),
  };
}

/**
 * Gets a user as seen by `caller`.
 */
export async function getUser(pool: Pool, caller: Caller | null, userId: number): Promise<UserView> {
  const result = await pool.query<UserRow>(`${USER_SELECT} WHERE u.id = $2`, [caller?.id ?? null, userId]);
  const row = result.rows[0];
  if (!row) throw new NotFoundError('User not found');
  return VIEWS.user.retrieve(row, caller);
}

/**
 * Registers a new user.
 *
 * @throws ValidationError if the email or username is already taken.
 */
export async function createUser(pool: Pool, input: CreateUserInput): Promise<CreatedUserView> {
  const passwordHash = await hashPassword(input.password);

  try {
    const result = await pool.query<Omit<UserRow, 'is_subscribed'>>(
      `INSERT INTO app_user (email, username, first_name, last_name, password_hash)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id, email, username, first_name, last_name`,
      [input.email, input.username, input.first_name, input.last_name, passwordHash],
    );
    return VIEWS.user.create(result.rows[0]);
  } catch (err) {
    if (isUniqueViolation(err, 'app_user_email_key')) {
      throw new ValidationError('A user with that email already exists', {
        email: ['A user with that email already exists.'],
      });
    }
    if (isUniqueViolation(err, 'app_user_username_key')) {
      throw new ValidationError('A user with that username already exists', {
        username: ['A user with that username already exists.'],
      });
    }
    throw err;
  }
}

/**
 * Changes the caller's password after checking the current one.
 */
export async function setPassword(pool: Pool, caller: Caller, input: SetPasswordInput): Promise<void> {
  const result = await pool.query<{ password_hash: string }>('SELECT password_hash FROM app_user WHERE id = $1', [
    caller.id,
  ]);
  const row = result.rows[0];
  if (!row) throw new NotFoundError('User not found');

  if (!(await verifyPassword(input.current_password, row.password_hash))) {
    throw new ValidationError('Current password is incorrect', {
      current_password: ['Current password is incorrect.'],
    });
  }

  await pool.query('UPDATE app_user SET password_hash = $2, updated_at = now() WHERE id = $1', [
    caller.id,
    await hashPassword(input.new_password),
  ]);
}

interface AuthorRecipes {
  recipes: RecipeSummary[];
  count: number;
}

/**
 * Loads recipe previews (newest first, at most `recipesLimit` each when given)
 * and recipe totals for a set of authors.
 */
async function loadAuthorRecipes(
  pool: Pool,
  authorIds: number[],
  recipesLimit: number | undefined,
): Promise<Map<number, AuthorRecipes>> {
  const byAuthor = new Map<number, AuthorRecipes>(authorIds.map((id) => [id, { recipes: [], count: 0 }]));
  if (authorIds.length === 0) return byAuthor;

  const [recipesResult, countsResult] = await Promise.all([
    pool.query<RecipeSummaryRow & { author_id: number }>(
      `SELECT id, name, image, cooking_time, author_id
       FROM (
         SELECT r.id, r.name, r.image, r.cooking_time, r.author_id,
                ROW_NUMBER() OVER (PARTITION BY r.author_id ORDER BY r.created_at DESC, r.id DESC) AS rn
         FROM recipe r
         WHERE r.author_id = ANY($1::int[])
       ) ranked
       WHERE $2::int IS NULL OR rn <= $2::int
       ORDER BY author_id, rn`,
      [authorIds, recipesLimit ?? null],
    ),
    pool.query<{ author_id: number; total: string }>(
      `SELECT author_id, COUNT(*) AS total
       FROM recipe
       WHERE author_id = ANY($1::int[])
       GROUP BY author_id`,
      [authorIds],
    ),
  ]);

  for (const row of recipesResult.rows) {
    byAuthor.get(row.author_id)?.recipes.push(toRecipeSummary(row));
  }
  for (const row of countsResult.rows) {
    const entry = byAuthor.get(row.author_id);
    if (entry) entry.count = parseInt(row.total, 10);
  }
  return byAuthor;
}

async function toFollowViews(
  pool: Pool,
  users: UserView[],
  recipesLimit: number | undefined,
  build: FollowViewBuilder,
): Promise<FollowView[]> {
  const recipesByAuthor = await loadAuthorRecipes(
    pool,
    users.map((user) => user.id),
    recipesLimit,
  );
  return users.map((user) => {
    const authorRecipes = recipesByAuthor.get(user.id);
    return build(user, authorRecipes?.recipes ?? [], authorRecipes?.count ?? 0);
  });
}

/**
 * Lists the authors `caller` follows, with recipe previews.
 */
export async function listSubscriptions(
  pool: Pool,
  caller: Caller,
  pagination: Pagination,
  recipesLimit?: number,
): Promise<ListSubscriptionsResult> {
  const [dataResult, countResult] = await Promise.all([
    pool.query<UserRow>(
      `${USER_SELECT}
       JOIN follow sub ON sub.author_id = u.id AND sub.user_id = $1
       ORDER BY u.id
       LIMIT $2 OFFSET $3`,
      [caller.id, pagination.limit, pagination.offset],
    ),
    pool.query<{ total: string }>('SELECT COUNT(*) AS total FROM follow WHERE user_id = $1', [caller.id]),
  ]);

  const users = dataResult.rows.map((row) => VIEWS.user.list(row, caller));
  return {
    authors: await toFollowViews(pool, users, recipesLimit, VIEWS.user.subscriptions),
    total: parseInt(countResult.rows[0]?.total ?? '0', 10),
  };
}

/**
 * Subscribes `caller` to an author.
 *
 * @throws NotFoundError if the author does not exist.
 * @throws ValidationError on self-subscription or an existing subscription.
 */
export async function subscribe(
  pool: Pool,
  caller: Caller,
  authorId: number,
  recipesLimit?: number,
): Promise<FollowView> {
  const author = await getUser(pool, caller, authorId);
  if (author.id === caller.id) {
    throw new ValidationError('You cannot subscribe to yourself');
  }

  const inserted = await pool.query(
    `INSERT INTO follow (user_id, author_id)
     VALUES ($1, $2)
     ON CONFLICT (user_id, author_id) DO NOTHING
     RETURNING id`,
    [caller.id, authorId],
  );
  if (inserted.rows.length === 0) {
    throw new ValidationError(`You are already subscribed to ${author.username}`);
  }

  const [view] = await toFollowViews(pool, [{ ...author, is_subscribed: true }], recipesLimit, VIEWS.user.subscribe);
  return view;
}

/**
 * Removes `caller`'s subscription to an author.
 *
 * @throws NotFoundError if the author does not exist.
 * @throws ValidationError if there was no subscription.
 */
export async function unsubscribe(pool: Pool, caller: Caller, authorId: number): Promise<void> {
  await getUser(pool, caller, authorId);

  const deleted = await pool.query('DELETE FROM follow WHERE user_id = $1 AND author_id = $2 RETURNING id', [
    caller.id,
    authorId,
  ]);
  if (deleted.rows.length === 0) {
    throw new ValidationError('You were not subscribed to this author');
  }
}
