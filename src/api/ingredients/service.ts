import type { Pool } from 'pg';

import { NotFoundError } from '../errors.ts';
import type { Ingredient } from './types.ts';

/**
 * Escapes LIKE/ILIKE wildcards so user input only ever matches literally.
 */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Lists ingredients, optionally restricted to names starting with `namePrefix`
 * (case-insensitive). Used for autocomplete.
 */
export async function listIngredients(pool: Pool, namePrefix?: string): Promise<Ingredient[]> {
  const prefix = namePrefix?.trim();
  if (!prefix) {
    const result = await pool.query<Ingredient>('SELECT id, name, measurement_unit FROM ingredient ORDER BY name, id');
    return result.rows;
  }

  const result = await pool.query<Ingredient>(
    `SELECT id, name, measurement_unit FROM ingredient
     WHERE lower(name) LIKE lower($1) ESCAPE '\\'
     ORDER BY name, id`,
    [`${escapeLikePattern(prefix)}%`],
  );
  return result.rows;
}

export async function getIngredient(pool: Pool, id: number): Promise<Ingredient> {
  const result = await pool.query<Ingredient>('SELECT id, name, measurement_unit FROM ingredient WHERE id = $1', [id]);
  const ingredient = result.rows[0];
  if (!ingredient) throw new NotFoundError('Ingredient not found');
  return ingredient;
}
