import { describe, it, expect } from 'vitest';

import { createRecipeSchema, updateRecipeSchema } from './schemas.ts';

const valid = {
  name: 'Porridge',
  text: 'Simmer oats in milk.',
  cooking_time: 10,
  tags: [1, 2],
  ingredients: [
    { id: 3, amount: 80 },
    { id: 4, amount: 250 },
  ],
};

function issuesOf(result: ReturnType<typeof createRecipeSchema.safeParse>): Array<{ path: string; message: string }> {
  if (result.success) return [];
  return result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

describe('createRecipeSchema', () => {
  it('accepts a complete recipe', () => {
    expect(createRecipeSchema.parse(valid)).toEqual(valid);
  });

  it('coerces numeric strings from form fields', () => {
    const parsed = createRecipeSchema.parse({ ...valid, cooking_time: '15', tags: ['1'], ingredients: [{ id: '3', amount: '2' }] });
    expect(parsed.cooking_time).toBe(15);
    expect(parsed.tags).toEqual([1]);
    expect(parsed.ingredients).toEqual([{ id: 3, amount: 2 }]);
  });

  it('rejects booleans and arrays in numeric fields', () => {
    const result = createRecipeSchema.safeParse({ ...valid, ingredients: [{ id: [3], amount: true }] });
    expect(issuesOf(result)).toEqual([
      { path: 'ingredients.0.id', message: 'Ingredient id must be a number' },
      { path: 'ingredients.0.amount', message: 'Amount must be a number' },
    ]);
  });

  it('rejects non-numeric strings', () => {
    const result = createRecipeSchema.safeParse({ ...valid, cooking_time: 'soon' });
    expect(issuesOf(result)).toEqual([{ path: 'cooking_time', message: 'Cooking time must be a number' }]);
  });

  it('rejects decimal strings', () => {
    const result = createRecipeSchema.safeParse({ ...valid, cooking_time: '2.5' });
    expect(issuesOf(result)).toEqual([{ path: 'cooking_time', message: 'Cooking time must be a whole number' }]);
  });

  it('rejects values beyond the integer column range', () => {
    const result = createRecipeSchema.safeParse({
      ...valid,
      cooking_time: 1e10,
      tags: [2147483648],
      ingredients: [{ id: 4e9, amount: 3e9 }],
    });
    expect(issuesOf(result)).toEqual([
      { path: 'cooking_time', message: 'Cooking time must be at most 2147483647' },
      { path: 'tags.0', message: 'Tag id must be at most 2147483647' },
      { path: 'ingredients.0.id', message: 'Ingredient id must be at most 2147483647' },
      { path: 'ingredients.0.amount', message: 'Amount must be at most 2147483647' },
    ]);
  });

  it('accepts the largest integer column value', () => {
    const parsed = createRecipeSchema.parse({ ...valid, ingredients: [{ id: 3, amount: 2147483647 }] });
    expect(parsed.ingredients).toEqual([{ id: 3, amount: 2147483647 }]);
  });

  it('deduplicates tag ids', () => {
    expect(createRecipeSchema.parse({ ...valid, tags: [2, 1, 2] }).tags).toEqual([2, 1]);
  });

  it('allows an empty tag list', () => {
    expect(createRecipeSchema.parse({ ...valid, tags: [] }).tags).toEqual([]);
  });

  it('rejects an amount below 1', () => {
    const result = createRecipeSchema.safeParse({ ...valid, ingredients: [{ id: 3, amount: 0 }] });
    expect(issuesOf(result)).toEqual([{ path: 'ingredients.0.amount', message: 'Amount must be at least 1' }]);
  });

  it('rejects the same ingredient twice', () => {
    const result = createRecipeSchema.safeParse({
      ...valid,
      ingredients: [
        { id: 3, amount: 1 },
        { id: 3, amount: 2 },
      ],
    });
    expect(issuesOf(result)).toEqual([{ path: 'ingredients.1.id', message: 'Ingredients must be unique' }]);
  });

  it('requires at least one ingredient', () => {
    const result = createRecipeSchema.safeParse({ ...valid, ingredients: [] });
    expect(issuesOf(result)).toEqual([{ path: 'ingredients', message: 'At least one ingredient is required' }]);
  });

  it('rejects a cooking time below 1', () => {
    const result = createRecipeSchema.safeParse({ ...valid, cooking_time: 0 });
    expect(issuesOf(result)).toEqual([{ path: 'cooking_time', message: 'Cooking time must be at least 1' }]);
  });

  it('rejects a blank name', () => {
    const result = createRecipeSchema.safeParse({ ...valid, name: '   ' });
    expect(issuesOf(result)).toEqual([{ path: 'name', message: 'Name cannot be empty' }]);
  });
});

describe('updateRecipeSchema', () => {
  it('leaves scalar fields optional', () => {
    expect(updateRecipeSchema.parse({ tags: [1], ingredients: [{ id: 3, amount: 1 }] })).toEqual({
      tags: [1],
      ingredients: [{ id: 3, amount: 1 }],
    });
  });

  it('still requires tags and ingredients', () => {
    const result = updateRecipeSchema.safeParse({ name: 'Porridge' });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((issue) => issue.message)).toEqual(['Tags are required', 'Ingredients are required']);
  });
});
