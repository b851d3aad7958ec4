/**
 * Recipe routes: CRUD, favorites, shopping cart and the shopping list download.
 *
 * Writes accept JSON (image as a base64 data URI) or multipart/form-data
 * (image as a file part, `tags` and `ingredients` as JSON text fields).
 */

import multipart from '@fastify/multipart';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Pool } from 'pg';

import { requireCaller } from './auth/middleware.ts';
import { DEFAULT_MAX_FILE_SIZE_BYTES } from './config.ts';
import { ValidationError } from './errors.ts';
import { decodeImageDataUri, imageFromUpload, type ImageStore, type ImageUpload } from './images/index.ts';
import {
  addRecipeToList,
  createRecipe,
  createRecipeSchema,
  deleteRecipe,
  getRecipe,
  listRecipes,
  removeRecipeFromList,
  updateRecipe,
  updateRecipeSchema,
  type RecipeFilterQuery,
  type RecipeListKind,
} from './recipes/index.ts';
import { SHOPPING_LIST_FILENAME, buildShoppingList } from './shopping-list/index.ts';
import { buildPage, parseId, parsePagination, type PaginationQuery } from './utils/pagination.ts';
import { parseOrThrow } from './utils/validation.ts';

interface IdParams {
  id: string;
}

type RecipeListQuery = RecipeFilterQuery & PaginationQuery;

/** Raw recipe fields plus the decoded image, if one was sent. */
interface RecipePayload {
  fields: Record<string, unknown>;
  image?: ImageUpload;
}

export interface RecipeRoutesOptions {
  pool: Pool;
  images: ImageStore;
  maxFileSizeBytes?: number;
}

/** Form fields that carry JSON arrays in multipart requests. */
const JSON_FORM_FIELDS = new Set(['tags', 'ingredients']);

const RECIPE_LIST_KINDS: readonly RecipeListKind[] = ['favorite', 'shopping_cart'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseFormField(name: string, value: unknown): unknown {
  if (!JSON_FORM_FIELDS.has(name) || typeof value !== 'string') return value;
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    throw new ValidationError(`${name} must be a JSON array`, { [name]: ['Expected a JSON array.'] });
  }
}

/**
 * Reads recipe fields and the image from either a JSON or a multipart body.
 */
async function readRecipePayload(req: FastifyRequest): Promise<RecipePayload> {
  if (req.isMultipart()) {
    const fields: Record<string, unknown> = {};
    let image: ImageUpload | undefined;
    for await (const part of req.parts()) {
      if (part.type === 'file') {
        const data = await part.toBuffer();
        if (part.fieldname === 'image') {
          image = imageFromUpload(data, part.mimetype);
        }
      } else {
        fields[part.fieldname] = parseFormField(part.fieldname, part.value);
      }
    }
    return { fields, image };
  }

  if (!isRecord(req.body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const { image, ...fields } = req.body;
  if (image === undefined || image === null || image === '') {
    return { fields };
  }
  if (typeof image !== 'string') {
    throw new ValidationError('Image must be a base64 data URI', { image: ['Expected a string.'] });
  }
  return { fields, image: decodeImageDataUri(image) };
}

/**
 * Fastify plugin that registers all /api/recipes routes.
 *
 * Usage:
 * ```ts
 * app.register(recipeRoutesPlugin, { pool, images: new LocalImageStore(mediaRoot) });
 * ```
 */
export async function recipeRoutesPlugin(app: FastifyInstance, opts: RecipeRoutesOptions): Promise<void> {
  const { pool, images } = opts;

  await app.register(multipart, {
    limits: {
      fileSize: opts.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES,
      files: 1,
    },
  });

  async function discardImage(req: FastifyRequest, imagePath: string): Promise<void> {
    try {
      await images.remove(imagePath);
    } catch (err) {
      req.log.warn({ err, imagePath }, '[Recipes] Failed to remove image');
    }
  }

  // GET /api/recipes — filtered, paginated, newest first
  app.get<{ Querystring: RecipeListQuery }>('/api/recipes', async (req) => {
    const pagination = parsePagination(req.query);
    const { recipes, total } = await listRecipes(pool, req.caller, req.query, pagination);
    return buildPage(req.url, pagination, total, recipes);
  });

  // GET /api/recipes/download_shopping_cart — plain-text roll-up of the caller's cart
  app.get('/api/recipes/download_shopping_cart', async (req, reply) => {
    const caller = requireCaller(req);
    const text = await buildShoppingList(pool, caller);
    return reply
      .header('content-type', 'text/plain; charset=utf-8')
      .header('content-disposition', `attachment; filename="${SHOPPING_LIST_FILENAME}"`)
      .send(text);
  });

  // GET /api/recipes/:id
  app.get<{ Params: IdParams }>('/api/recipes/:id', async (req, reply) => {
    const id = parseId(req.params.id);
    if (id === null) return reply.code(400).send({ error: 'Invalid recipe ID' });
    return getRecipe(pool, req.caller, id);
  });

  // POST /api/recipes
  app.post('/api/recipes', async (req, reply) => {
    const caller = requireCaller(req);
    const payload = await readRecipePayload(req);
    const fields = parseOrThrow(createRecipeSchema, payload.fields);
    if (!payload.image) {
      throw new ValidationError('Image is required', { image: ['This field is required.'] });
    }

    const imagePath = await images.save(payload.image);
    try {
      const recipe = await createRecipe(pool, caller, { ...fields, image: imagePath });
      req.log.info({ recipeId: recipe.id, authorId: caller.id }, '[Recipes] Created recipe');
      return reply.code(201).send(recipe);
    } catch (err) {
      await discardImage(req, imagePath);
      throw err;
    }
  });

  // PATCH /api/recipes/:id — author only; tags and ingredients are replaced
  app.patch<{ Params: IdParams }>('/api/recipes/:id', async (req, reply) => {
    const caller = requireCaller(req);
    const id = parseId(req.params.id);
    if (id === null) return reply.code(400).send({ error: 'Invalid recipe ID' });

    const payload = await readRecipePayload(req);
    const fields = parseOrThrow(updateRecipeSchema, payload.fields);

    const imagePath = payload.image ? await images.save(payload.image) : undefined;
    try {
      const { recipe, replacedImage } = await updateRecipe(pool, caller, id, { ...fields, image: imagePath });
      if (replacedImage) await discardImage(req, replacedImage);
      return recipe;
    } catch (err) {
      if (imagePath) await discardImage(req, imagePath);
      throw err;
    }
  });

  // DELETE /api/recipes/:id — author only
  app.delete<{ Params: IdParams }>('/api/recipes/:id', async (req, reply) => {
    const caller = requireCaller(req);
    const id = parseId(req.params.id);
    if (id === null) return reply.code(400).send({ error: 'Invalid recipe ID' });

    const imagePath = await deleteRecipe(pool, caller, id);
    await discardImage(req, imagePath);
    return reply.code(204).send();
  });

  // POST/DELETE /api/recipes/:id/favorite and /api/recipes/:id/shopping_cart
  for (const kind of RECIPE_LIST_KINDS) {
    app.post<{ Params: IdParams }>(`/api/recipes/:id/${kind}`, async (req, reply) => {
      const caller = requireCaller(req);
      const id = parseId(req.params.id);
      if (id === null) return reply.code(400).send({ error: 'Invalid recipe ID' });
      const recipe = await addRecipeToList(pool, caller, kind, id);
      return reply.code(201).send(recipe);
    });

    app.delete<{ Params: IdParams }>(`/api/recipes/:id/${kind}`, async (req, reply) => {
      const caller = requireCaller(req);
      const id = parseId(req.params.id);
      if (id === null) return reply.code(400).send({ error: 'Invalid recipe ID' });
      await removeRecipeFromList(pool, caller, kind, id);
      return reply.code(204).send();
    });
  }
}
