import { z } from 'zod';

import { MAX_INT4 } from '../utils/pagination.ts';

const NUMERIC_STRING = /^\s*-?\d+(\.\d+)?\s*$/;

/**
 * A whole number that fits an `integer` column. Multipart form fields arrive
 * as text, so numeric strings are converted; booleans, arrays and other
 * strings are rejected.
 */
function wholeNumber(label: string, minMessage: string) {
  return z.preprocess(
    (value) => (typeof value === 'string' && NUMERIC_STRING.test(value) ? Number(value) : value),
    z
      .number({ required_error: `${label} is required`, invalid_type_error: `${label} must be a number` })
      .int(`${label} must be a whole number`)
      .min(1, minMessage)
      .max(MAX_INT4, `${label} must be at most ${MAX_INT4}`),
  );
}

const ingredientAmountSchema = z.object({
  id: wholeNumber('Ingredient id', 'Ingredient id must be positive'),
  amount: wholeNumber('Amount', 'Amount must be at least 1'),
});

const ingredientsSchema = z
  .array(ingredientAmountSchema, { required_error: 'Ingredients are required' })
  .min(1, 'At least one ingredient is required')
  .superRefine((items, ctx) => {
    const seen = new Set<number>();
    items.forEach((item, index) => {
      if (seen.has(item.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Ingredients must be unique', path: [index, 'id'] });
      }
      seen.add(item.id);
    });
  });

const tagsSchema = z
  .array(wholeNumber('Tag id', 'Tag id must be positive'), {
    required_error: 'Tags are required',
  })
  .transform((ids) => [...new Set(ids)]);

const name = z.string().trim().min(1, 'Name cannot be empty').max(200, 'Name must be 200 characters or less');
const text = z.string().trim().min(1, 'Description cannot be empty');
const cookingTime = wholeNumber('Cooking time', 'Cooking time must be at least 1');

/** Recipe fields of a create request. The image is resolved separately. */
export const createRecipeSchema = z.object({
  name,
  text,
  cooking_time: cookingTime,
  tags: tagsSchema,
  ingredients: ingredientsSchema,
});

/** Recipe fields of an update request: associations are always replaced. */
export const updateRecipeSchema = z.object({
  name: name.optional(),
  text: text.optional(),
  cooking_time: cookingTime.optional(),
  tags: tagsSchema,
  ingredients: ingredientsSchema,
});
