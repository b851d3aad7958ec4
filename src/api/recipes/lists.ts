/**
 * Favorites and shopping cart: per-user recipe lists backed by join tables
 * with a UNIQUE (user_id, recipe_id) constraint.
 */

import type { Pool, QueryResult } from 'pg';

import type { Caller } from '../auth/middleware.ts';
import { NotFoundError, ValidationError } from '../errors.ts';
import { isForeignKeyViolation } from '../utils/pg-errors.ts';
import { VIEWS } from '../views.ts';
import type { RecipeSummary, RecipeSummaryRow } from './types.ts';

export type RecipeListKind = 'favorite' | 'shopping_cart';

interface RecipeListDefinition {
  table: string;
  duplicateMessage: (recipeName: string) => string;
  missingMessage: string;
}

const RECIPE_LISTS = {
  favorite: {
    table: 'favorite',
    duplicateMessage: (recipeName) => `Recipe "${recipeName}" is already in favorites`,
    missingMessage: 'Recipe is not in favorites',
  },
  shopping_cart: {
    table: 'shopping_cart',
    duplicateMessage: (recipeName) => `Recipe "${recipeName}" is already in the shopping cart`,
    missingMessage: 'Recipe is not in the shopping cart',
  },
} as const satisfies Record<RecipeListKind, RecipeListDefinition>;

async function getRecipeSummaryRow(pool: Pool, recipeId: number): Promise<RecipeSummaryRow> {
  const result = await pool.query<RecipeSummaryRow>('SELECT id, name, image, cooking_time FROM recipe WHERE id = $1', [
    recipeId,
  ]);
  const row = result.rows[0];
  if (!row) throw new NotFoundError('Recipe not found');
  return row;
}

/**
 * Adds a recipe to one of the caller's lists.
 *
 * @throws ValidationError if the recipe is already on the list.
 * @throws NotFoundError if the recipe does not exist, including when it is deleted concurrently.
 */
export async function addRecipeToList(
  pool: Pool,
  caller: Caller,
  kind: RecipeListKind,
  recipeId: number,
): Promise<RecipeSummary> {
  const list = RECIPE_LISTS[kind];
  const recipe = await getRecipeSummaryRow(pool, recipeId);

  let inserted: QueryResult<{ id: number }>;
  try {
    inserted = await pool.query<{ id: number }>(
      `INSERT INTO ${list.table} (user_id, recipe_id)
       VALUES ($1, $2)
       ON CONFLICT (user_id, recipe_id) DO NOTHING
       RETURNING id`,
      [caller.id, recipeId],
    );
  } catch (err) {
    // Recipe deleted after the lookup above
    if (isForeignKeyViolation(err)) throw new NotFoundError('Recipe not found');
    throw err;
  }
  if (inserted.rows.length === 0) {
    throw new ValidationError(list.duplicateMessage(recipe.name));
  }

  return VIEWS.recipe[kind](recipe);
}

/**
 * Removes a recipe from one of the caller's lists.
 *
 * @throws ValidationError if the recipe was not on the list.
 */
export async function removeRecipeFromList(
  pool: Pool,
  caller: Caller,
  kind: RecipeListKind,
  recipeId: number,
): Promise<void> {
  const list = RECIPE_LISTS[kind];
  await getRecipeSummaryRow(pool, recipeId);

  const deleted = await pool.query(`DELETE FROM ${list.table} WHERE user_id = $1 AND recipe_id = $2 RETURNING id`, [
    caller.id,
    recipeId,
  ]);
  if (deleted.rows.length === 0) {
    throw new ValidationError(list.missingMessage);
  }
}
