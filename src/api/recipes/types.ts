/**
 * Recipe types for the recipes API.
 *
 * Property names use snake_case to match the wire format.
 */

import type { Tag } from '../tags/types.ts';
import type { UserView } from '../users/types.ts';

/** Columns needed for the summary view. */
export interface RecipeSummaryRow {
  id: number;
  name: string;
  image: string;
  cooking_time: number;
}

/** A recipe row joined with its author and the caller's flags. */
export interface RecipeRow extends RecipeSummaryRow {
  text: string;
  author_id: number;
  author_email: string;
  author_username: string;
  author_first_name: string;
  author_last_name: string;
  author_is_subscribed: boolean;
  is_favorited: boolean;
  is_in_shopping_cart: boolean;
}

/** A tag attached to a recipe. */
export interface RecipeTagRow extends Tag {
  recipe_id: number;
}

/** An ingredient line of a recipe. */
export interface RecipeIngredientRow {
  recipe_id: number;
  id: number;
  name: string;
  measurement_unit: string;
  amount: number;
}

/** Compact recipe representation used in lists and relationship responses. */
export interface RecipeSummary {
  id: number;
  name: string;
  image: string;
  cooking_time: number;
}

export interface RecipeIngredientView {
  id: number;
  name: string;
  measurement_unit: string;
  amount: number;
}

/** Full recipe representation as seen by a particular caller. */
export interface RecipeView {
  id: number;
  tags: Tag[];
  author: UserView;
  ingredients: RecipeIngredientView[];
  is_favorited: boolean;
  is_in_shopping_cart: boolean;
  name: string;
  image: string;
  text: string;
  cooking_time: number;
}

/** One `{id, amount}` entry of a recipe write. */
export interface IngredientAmountInput {
  id: number;
  amount: number;
}

/** Validated recipe fields, shared by create and update. */
export interface RecipeWriteInput {
  name: string;
  text: string;
  cooking_time: number;
  tags: number[];
  ingredients: IngredientAmountInput[];
}

/** Create input. `image` is the stored media path. */
export interface CreateRecipeInput extends RecipeWriteInput {
  image: string;
}

/**
 * Update input. Tags and ingredients are always replaced; omitted scalar
 * fields keep their stored values.
 */
export interface UpdateRecipeInput {
  name?: string;
  text?: string;
  cooking_time?: number;
  image?: string;
  tags: number[];
  ingredients: IngredientAmountInput[];
}

export interface ListRecipesResult {
  recipes: RecipeView[];
  total: number;
}
