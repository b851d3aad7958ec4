/**
 * Shopping list: rolls the caller's cart up into one line per
 * (ingredient name, measurement unit) pair.
 */

import type { Pool } from 'pg';

import type { Caller } from '../auth/middleware.ts';

/** One ingredient line of one recipe in the cart. */
export interface CartIngredientRow {
  name: string;
  measurement_unit: string;
  amount: number;
}

export interface ShoppingListItem {
  name: string;
  measurement_unit: string;
  amount: number;
}

export const SHOPPING_LIST_FILENAME = 'shopping_list.txt';

/**
 * Fetches every ingredient line of every recipe in the caller's cart,
 * ordered by name then unit.
 */
export async function getCartIngredients(pool: Pool, caller: Caller): Promise<CartIngredientRow[]> {
  const result = await pool.query<CartIngredientRow>(
    `SELECT i.name, i.measurement_unit, ri.amount
     FROM shopping_cart sc
     JOIN recipe_ingredient ri ON ri.recipe_id = sc.recipe_id
     JOIN ingredient i ON i.id = ri.ingredient_id
     WHERE sc.user_id = $1
     ORDER BY i.name, i.measurement_unit, sc.recipe_id`,
    [caller.id],
  );
  return result.rows;
}

/**
 * Sums amounts per (name, unit) pair, keeping the order in which each pair
 * first appears.
 */
export function aggregateShoppingList(rows: CartIngredientRow[]): ShoppingListItem[] {
  const items = new Map<string, ShoppingListItem>();
  for (const row of rows) {
    const key = JSON.stringify([row.name, row.measurement_unit]);
    const item = items.get(key);
    if (item) {
      item.amount += row.amount;
    } else {
      items.set(key, { name: row.name, measurement_unit: row.measurement_unit, amount: row.amount });
    }
  }
  return [...items.values()];
}

/** Renders `"<name>  - <amount>(<unit>)"`, one newline-terminated line per item. */
export function formatShoppingList(items: ShoppingListItem[]): string {
  return items.map((item) => `${item.name}  - ${item.amount}(${item.measurement_unit})\n`).join('');
}

export async function buildShoppingList(pool: Pool, caller: Caller): Promise<string> {
  return formatShoppingList(aggregateShoppingList(await getCartIngredients(pool, caller)));
}
