/**
 * Representation used by each (resource, operation) pair. Services take their
 * view builder from this table; no view is chosen from a request at run time.
 */

import { toRecipeSummary, toRecipeView } from './recipes/views.ts';
import { toCreatedUserView, toFollowView, toUserView } from './users/views.ts';

export const VIEWS = {
  recipe: {
    list: toRecipeView,
    retrieve: toRecipeView,
    create: toRecipeView,
    update: toRecipeView,
    favorite: toRecipeSummary,
    shopping_cart: toRecipeSummary,
  },
  user: {
    list: toUserView,
    retrieve: toUserView,
    create: toCreatedUserView,
    subscriptions: toFollowView,
    subscribe: toFollowView,
  },
} as const;

export type RecipeViewBuilder = typeof toRecipeView;
export type FollowViewBuilder = typeof toFollowView;
