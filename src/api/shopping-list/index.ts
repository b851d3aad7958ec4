export type { CartIngredientRow, ShoppingListItem } from './service.ts';
export {
  SHOPPING_LIST_FILENAME,
  aggregateShoppingList,
  buildShoppingList,
  formatShoppingList,
  getCartIngredients,
} from './service.ts';
