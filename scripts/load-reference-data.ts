/**
 * Load the ingredient and tag catalogs from data/*.json.
 * Existing rows are left alone, so the script can be re-run.
 * Usage: tsx scripts/load-reference-data.ts
 */
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { createPool, withTransaction } from '../src/db.ts';

const DATA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../data');

const ingredientsSchema = z.array(
  z.object({
    name: z.string().min(1).max(200),
    measurement_unit: z.string().min(1).max(200),
  }),
);

const tagsSchema = z.array(
  z.object({
    name: z.string().min(1).max(200),
    color: z.string().regex(/^#[0-9A-Fa-f]{6}$/),
    slug: z.string().regex(/^[-a-zA-Z0-9_]+$/),
  }),
);

function readJson(filename: string): unknown {
  return JSON.parse(readFileSync(path.join(DATA_DIR, filename), 'utf-8'));
}

async function main(): Promise<void> {
  const ingredients = ingredientsSchema.parse(readJson('ingredients.json'));
  const tags = tagsSchema.parse(readJson('tags.json'));

  const pool = createPool();
  try {
    const [ingredientCount, tagCount] = await withTransaction(pool, async (client) => {
      const insertedIngredients = await client.query(
        `INSERT INTO ingredient (name, measurement_unit)
         SELECT * FROM unnest($1::text[], $2::text[])
         ON CONFLICT DO NOTHING
         RETURNING id`,
        [ingredients.map((i) => i.name), ingredients.map((i) => i.measurement_unit)],
      );
      const insertedTags = await client.query(
        `INSERT INTO tag (name, color, slug)
         SELECT * FROM unnest($1::text[], $2::text[], $3::text[])
         ON CONFLICT DO NOTHING
         RETURNING id`,
        [tags.map((t) => t.name), tags.map((t) => t.color), tags.map((t) => t.slug)],
      );
      return [insertedIngredients.rows.length, insertedTags.rows.length];
    });

    console.log(`[ReferenceData] Inserted ${ingredientCount} of ${ingredients.length} ingredients`);
    console.log(`[ReferenceData] Inserted ${tagCount} of ${tags.length} tags`);
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error('[ReferenceData] Failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
