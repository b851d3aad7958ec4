import type { Caller } from '../auth/middleware.ts';
import { mediaUrl } from '../images/index.ts';
import type { Tag } from '../tags/types.ts';
import type {
  RecipeIngredientRow,
  RecipeIngredientView,
  RecipeRow,
  RecipeSummary,
  RecipeSummaryRow,
  RecipeTagRow,
  RecipeView,
} from './types.ts';

export function toRecipeSummary(row: RecipeSummaryRow): RecipeSummary {
  return {
    id: row.id,
    name: row.name,
    image: mediaUrl(row.image),
    cooking_time: row.cooking_time,
  };
}

function toTag(row: RecipeTagRow): Tag {
  return { id: row.id, name: row.name, color: row.color, slug: row.slug };
}

function toIngredientLine(row: RecipeIngredientRow): RecipeIngredientView {
  return { id: row.id, name: row.name, measurement_unit: row.measurement_unit, amount: row.amount };
}

/**
 * Full recipe representation. Favorite and cart flags are only ever true for
 * an authenticated caller.
 */
export function toRecipeView(
  row: RecipeRow,
  tags: RecipeTagRow[],
  ingredients: RecipeIngredientRow[],
  caller: Caller | null,
): RecipeView {
  return {
    id: row.id,
    tags: tags.map(toTag),
    author: {
      id: row.author_id,
      email: row.author_email,
      username: row.author_username,
      first_name: row.author_first_name,
      last_name: row.author_last_name,
      is_subscribed: caller !== null && caller.id !== row.author_id && row.author_is_subscribed,
    },
    ingredients: ingredients.map(toIngredientLine),
    is_favorited: caller !== null && row.is_favorited,
    is_in_shopping_cart: caller !== null && row.is_in_shopping_cart,
    name: row.name,
    image: mediaUrl(row.image),
    text: row.text,
    cooking_time: row.cooking_time,
  };
}

/** Buckets rows by their `recipe_id`, preserving order within each bucket. */
export function groupByRecipe<T extends { recipe_id: number }>(rows: T[]): Map<number, T[]> {
  const grouped = new Map<number, T[]>();
  for (const row of rows) {
    const bucket = grouped.get(row.recipe_id);
    if (bucket) {
      bucket.push(row);
    } else {
      grouped.set(row.recipe_id, [row]);
    }
  }
  return grouped;
}
