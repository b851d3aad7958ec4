import type { Pool } from 'pg';

import { NotFoundError } from '../errors.ts';
import type { Tag } from './types.ts';

export async function listTags(pool: Pool): Promise<Tag[]> {
  const result = await pool.query<Tag>('SELECT id, name, color, slug FROM tag ORDER BY name');
  return result.rows;
}

export async function getTag(pool: Pool, id: number): Promise<Tag> {
  const result = await pool.query<Tag>('SELECT id, name, color, slug FROM tag WHERE id = $1', [id]);
  const tag = result.rows[0];
  if (!tag) throw new NotFoundError('Tag not found');
  return tag;
}
