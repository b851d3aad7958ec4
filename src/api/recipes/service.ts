/**
 * Recipe service: listing, retrieval and author-only writes.
 *
 * Every write that touches more than one row runs inside a single
 * transaction, so a rejected ingredient or tag leaves nothing behind.
 */

import type { Pool, PoolClient } from 'pg';

import { withTransaction } from '../../db.ts';
import type { Caller } from '../auth/middleware.ts';
import { NotFoundError, PermissionDeniedError, ValidationError } from '../errors.ts';
import type { Pagination } from '../utils/pagination.ts';
import { VIEWS, type RecipeViewBuilder } from '../views.ts';
import { buildRecipeFilter, toWhereClause, type RecipeFilterQuery } from './filters.ts';
import type {
  CreateRecipeInput,
  IngredientAmountInput,
  ListRecipesResult,
  RecipeIngredientRow,
  RecipeRow,
  RecipeTagRow,
  RecipeView,
  UpdateRecipeInput,
} from './types.ts';
import { groupByRecipe } from './views.ts';

/** Recipe columns plus author and caller flags. `$1` is the caller id (or NULL). */
const RECIPE_SELECT = `
  SELECT r.id, r.name, r.image, r.text, r.cooking_time, r.author_id,
         u.email AS author_email, u.username AS author_username,
         u.first_name AS author_first_name, u.last_name AS author_last_name,
         EXISTS (SELECT 1 FROM follow f WHERE f.user_id = $1 AND f.author_id = r.author_id) AS author_is_subscribed,
         EXISTS (SELECT 1 FROM favorite fv WHERE fv.user_id = $1 AND fv.recipe_id = r.id) AS is_favorited,
         EXISTS (SELECT 1 FROM shopping_cart sc WHERE sc.user_id = $1 AND sc.recipe_id = r.id) AS is_in_shopping_cart
  FROM recipe r
  JOIN app_user u ON u.id = r.author_id`;

/**
 * Loads tags and ingredient lines for a set of recipes and builds their views,
 * preserving the order of `rows`.
 */
async function buildViews(
  pool: Pool,
  rows: RecipeRow[],
  caller: Caller | null,
  build: RecipeViewBuilder,
): Promise<RecipeView[]> {
  if (rows.length === 0) return [];

  const ids = rows.map((row) => row.id);
  const [tagsResult, ingredientsResult] = await Promise.all([
    pool.query<RecipeTagRow>(
      `SELECT rt.recipe_id, t.id, t.name, t.color, t.slug
       FROM recipe_tag rt
       JOIN tag t ON t.id = rt.tag_id
       WHERE rt.recipe_id = ANY($1::int[])
       ORDER BY rt.recipe_id, t.id`,
      [ids],
    ),
    pool.query<RecipeIngredientRow>(
      `SELECT ri.recipe_id, i.id, i.name, i.measurement_unit, ri.amount
       FROM recipe_ingredient ri
       JOIN ingredient i ON i.id = ri.ingredient_id
       WHERE ri.recipe_id = ANY($1::int[])
       ORDER BY ri.recipe_id, ri.position`,
      [ids],
    ),
  ]);

  const tagsByRecipe = groupByRecipe(tagsResult.rows);
  const ingredientsByRecipe = groupByRecipe(ingredientsResult.rows);

  return rows.map((row) =>
    build(row, tagsByRecipe.get(row.id) ?? [], ingredientsByRecipe.get(row.id) ?? [], caller),
  );
}

/**
 * Lists recipes newest first, filtered by tags, author, and the caller's
 * favorites / cart.
 */
export async function listRecipes(
  pool: Pool,
  caller: Caller | null,
  query: RecipeFilterQuery,
  pagination: Pagination,
): Promise<ListRecipesResult> {
  // Data query binds the caller id as $1, so its predicates start at $2
  const dataFilter = buildRecipeFilter(caller, query, 2);
  const countFilter = buildRecipeFilter(caller, query, 1);
  const limitIdx = dataFilter.params.length + 2;

  const [dataResult, countResult] = await Promise.all([
    pool.query<RecipeRow>(
      `${RECIPE_SELECT}
       ${toWhereClause(dataFilter)}
       ORDER BY r.created_at DESC, r.id DESC
       LIMIT $${limitIdx} OFFSET $${limitIdx + 1}`,
      [caller?.id ?? null, ...dataFilter.params, pagination.limit, pagination.offset],
    ),
    pool.query<{ total: string }>(`SELECT COUNT(*) AS total FROM recipe r ${toWhereClause(countFilter)}`, countFilter.params),
  ]);

  return {
    recipes: await buildViews(pool, dataResult.rows, caller, VIEWS.recipe.list),
    total: parseInt(countResult.rows[0]?.total ?? '0', 10),
  };
}

/**
 * Gets a single recipe in its full representation.
 */
export async function getRecipe(pool: Pool, caller: Caller | null, recipeId: number): Promise<RecipeView> {
  return loadRecipe(pool, caller, recipeId, VIEWS.recipe.retrieve);
}

async function loadRecipe(
  pool: Pool,
  caller: Caller | null,
  recipeId: number,
  build: RecipeViewBuilder,
): Promise<RecipeView> {
  const result = await pool.query<RecipeRow>(`${RECIPE_SELECT} WHERE r.id = $2`, [caller?.id ?? null, recipeId]);
  const row = result.rows[0];
  if (!row) throw new NotFoundError('Recipe not found');

  const [view] = await buildViews(pool, [row], caller, build);
  return view;
}

async function assertTagsExist(client: PoolClient, tagIds: number[]): Promise<void> {
  if (tagIds.length === 0) return;
  const result = await client.query<{ id: number }>('SELECT id FROM tag WHERE id = ANY($1::int[])', [tagIds]);
  const found = new Set(result.rows.map((row) => row.id));
  const missing = tagIds.filter((id) => !found.has(id));
  if (missing.length > 0) {
    throw new ValidationError(`Unknown tag id: ${missing.join(', ')}`, {
      tags: missing.map((id) => `Tag ${id} does not exist.`),
    });
  }
}

async function assertIngredientsExist(client: PoolClient, ingredients: IngredientAmountInput[]): Promise<void> {
  const ids = ingredients.map((item) => item.id);
  const result = await client.query<{ id: number }>('SELECT id FROM ingredient WHERE id = ANY($1::int[])', [ids]);
  const found = new Set(result.rows.map((row) => row.id));
  const missing = ids.filter((id) => !found.has(id));
  if (missing.length > 0) {
    throw new NotFoundError(`Ingredient not found: ${missing.join(', ')}`);
  }
}

/** Inserts ingredient lines (in submission order) and tag links for a recipe. */
async function insertAssociations(
  client: PoolClient,
  recipeId: number,
  tagIds: number[],
  ingredients: IngredientAmountInput[],
): Promise<void> {
  await client.query(
    `INSERT INTO recipe_ingredient (recipe_id, ingredient_id, amount, position)
     SELECT $1, line.ingredient_id, line.amount, line.position
     FROM unnest($2::int[], $3::int[]) WITH ORDINALITY AS line(ingredient_id, amount, position)`,
    [recipeId, ingredients.map((item) => item.id), ingredients.map((item) => item.amount)],
  );

  if (tagIds.length > 0) {
    await client.query(
      `INSERT INTO recipe_tag (recipe_id, tag_id)
       SELECT $1, tag_id FROM unnest($2::int[]) AS tag_id`,
      [recipeId, tagIds],
    );
  }
}

/**
 * Creates a recipe authored by `caller` and returns its full representation.
 */
export async function createRecipe(pool: Pool, caller: Caller, input: CreateRecipeInput): Promise<RecipeView> {
  const recipeId = await withTransaction(pool, async (client) => {
    await assertTagsExist(client, input.tags);
    await assertIngredientsExist(client, input.ingredients);

    const inserted = await client.query<{ id: number }>(
      `INSERT INTO recipe (author_id, name, image, text, cooking_time)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING id`,
      [caller.id, input.name, input.image, input.text, input.cooking_time],
    );
    const id = inserted.rows[0].id;

    await insertAssociations(client, id, input.tags, input.ingredients);
    return id;
  });

  return loadRecipe(pool, caller, recipeId, VIEWS.recipe.create);
}

/**
 * Locks a recipe row and checks that `caller` authored it.
 */
async function lockOwnedRecipe(client: PoolClient, caller: Caller, recipeId: number): Promise<{ image: string }> {
  const result = await client.query<{ author_id: number; image: string }>(
    'SELECT author_id, image FROM recipe WHERE id = $1 FOR UPDATE',
    [recipeId],
  );
  const row = result.rows[0];
  if (!row) throw new NotFoundError('Recipe not found');
  if (row.author_id !== caller.id) {
    throw new PermissionDeniedError('Only the author can change this recipe');
  }
  return { image: row.image };
}

/** Result of an update: the new view plus the image it replaced, if any. */
export interface UpdateRecipeResult {
  recipe: RecipeView;
  replacedImage: string | null;
}

/**
 * Updates a recipe owned by `caller`. Ingredient and tag associations are
 * cleared and rebuilt from `input` in the same transaction.
 */
export async function updateRecipe(
  pool: Pool,
  caller: Caller,
  recipeId: number,
  input: UpdateRecipeInput,
): Promise<UpdateRecipeResult> {
  const previousImage = await withTransaction(pool, async (client) => {
    const current = await lockOwnedRecipe(client, caller, recipeId);
    await assertTagsExist(client, input.tags);
    await assertIngredientsExist(client, input.ingredients);

    await client.query(
      `UPDATE recipe SET
         name = COALESCE($2, name),
         text = COALESCE($3, text),
         cooking_time = COALESCE($4, cooking_time),
         image = COALESCE($5, image),
         updated_at = now()
       WHERE id = $1`,
      [recipeId, input.name ?? null, input.text ?? null, input.cooking_time ?? null, input.image ?? null],
    );

    await client.query('DELETE FROM recipe_ingredient WHERE recipe_id = $1', [recipeId]);
    await client.query('DELETE FROM recipe_tag WHERE recipe_id = $1', [recipeId]);
    await insertAssociations(client, recipeId, input.tags, input.ingredients);

    return current.image;
  });

  const recipe = await loadRecipe(pool, caller, recipeId, VIEWS.recipe.update);
  const replacedImage = input.image !== undefined && input.image !== previousImage ? previousImage : null;
  return { recipe, replacedImage };
}

/**
 * Deletes a recipe owned by `caller`.
 *
 * @returns The media path of the deleted recipe's image.
 */
export async function deleteRecipe(pool: Pool, caller: Caller, recipeId: number): Promise<string> {
  return withTransaction(pool, async (client) => {
    const current = await lockOwnedRecipe(client, caller, recipeId);
    await client.query('DELETE FROM recipe WHERE id = $1', [recipeId]);
    return current.image;
  });
}
