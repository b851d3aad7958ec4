export type * from './types.ts';
export type { RecipeFilterQuery, SqlFilter } from './filters.ts';
export type { RecipeListKind } from './lists.ts';
export type { UpdateRecipeResult } from './service.ts';
export { buildRecipeFilter, parseTagSlugs, toWhereClause } from './filters.ts';
export { addRecipeToList, removeRecipeFromList } from './lists.ts';
export { createRecipeSchema, updateRecipeSchema } from './schemas.ts';
export { listRecipes, getRecipe, createRecipe, updateRecipe, deleteRecipe } from './service.ts';
export { toRecipeSummary, toRecipeView } from './views.ts';
