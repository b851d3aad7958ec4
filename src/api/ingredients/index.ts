export type { Ingredient } from './types.ts';
export { listIngredients, getIngredient, escapeLikePattern } from './service.ts';
