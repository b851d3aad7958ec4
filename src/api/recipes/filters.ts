/**
 * Translates recipe list query parameters into SQL predicates over `recipe r`,
 * scoped to the calling user.
 */

import type { Caller } from '../auth/middleware.ts';
import { ValidationError } from '../errors.ts';
import { parseId } from '../utils/pagination.ts';
import { singleQueryValue } from '../utils/validation.ts';

/** Recipe list query parameters. Repeated keys arrive as arrays. */
export interface RecipeFilterQuery {
  tags?: string | string[];
  author?: string | string[];
  is_favorited?: string | string[];
  is_in_shopping_cart?: string | string[];
}

export interface SqlFilter {
  clauses: string[];
  params: unknown[];
}

/**
 * Collects tag slugs from repeated `tags=` keys and comma-separated values.
 */
export function parseTagSlugs(raw: string | string[] | undefined): string[] {
  if (raw === undefined) return [];
  const values = Array.isArray(raw) ? raw : [raw];
  const slugs = values.flatMap((value) => value.split(',')).map((slug) => slug.trim()).filter(Boolean);
  return [...new Set(slugs)];
}

/** Only the literal "1" switches a membership filter on. */
function isEnabled(raw: string | string[] | undefined): boolean {
  return raw === '1';
}

/**
 * Builds the WHERE predicates for a recipe listing.
 *
 * - `tags`: recipes carrying ANY of the given slugs
 * - `author`: exact author id
 * - `is_favorited=1` / `is_in_shopping_cart=1`: the caller's favorites / cart;
 *   ignored for anonymous callers and for any other value
 *
 * Placeholders are numbered from `firstParam` so the predicates can follow
 * parameters the caller already bound.
 */
export function buildRecipeFilter(caller: Caller | null, query: RecipeFilterQuery, firstParam = 1): SqlFilter {
  const clauses: string[] = [];
  const params: unknown[] = [];
  let paramIdx = firstParam;

  const slugs = parseTagSlugs(query.tags);
  if (slugs.length > 0) {
    clauses.push(
      `EXISTS (SELECT 1 FROM recipe_tag rt JOIN tag t ON t.id = rt.tag_id
               WHERE rt.recipe_id = r.id AND t.slug = ANY($${paramIdx}::text[]))`,
    );
    params.push(slugs);
    paramIdx++;
  }

  const author = singleQueryValue('author', query.author);
  if (author !== undefined && author !== '') {
    const authorId = parseId(author);
    if (authorId === null) {
      throw new ValidationError('author must be a user id', { author: ['Enter a whole number.'] });
    }
    clauses.push(`r.author_id = $${paramIdx}`);
    params.push(authorId);
    paramIdx++;
  }

  if (caller && isEnabled(query.is_favorited)) {
    clauses.push(`EXISTS (SELECT 1 FROM favorite ff WHERE ff.recipe_id = r.id AND ff.user_id = $${paramIdx})`);
    params.push(caller.id);
    paramIdx++;
  }

  if (caller && isEnabled(query.is_in_shopping_cart)) {
    clauses.push(`EXISTS (SELECT 1 FROM shopping_cart fc WHERE fc.recipe_id = r.id AND fc.user_id = $${paramIdx})`);
    params.push(caller.id);
    paramIdx++;
  }

  return { clauses, params };
}

export function toWhereClause(filter: SqlFilter): string {
  return filter.clauses.length > 0 ? `WHERE ${filter.clauses.join(' AND ')}` : '';
}
