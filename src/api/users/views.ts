import type { Caller } from '../auth/middleware.ts';
import type { RecipeSummary } from '../recipes/types.ts';
import type { CreatedUserView, FollowView, UserRow, UserView } from './types.ts';

/**
 * User representation as seen by `caller`. Anonymous callers and self-lookups
 * never report a subscription.
 */
export function toUserView(row: UserRow, caller: Caller | null): UserView {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    first_name: row.first_name,
    last_name: row.last_name,
    is_subscribed: caller !== null && caller.id !== row.id && row.is_subscribed,
  };
}

export function toCreatedUserView(row: Omit<UserRow, 'is_subscribed'>): CreatedUserView {
  return {
    id: row.id,
    email: row.email,
    username: row.username,
    first_name: row.first_name,
    last_name: row.last_name,
  };
}

export function toFollowView(user: UserView, recipes: RecipeSummary[], recipesCount: number): FollowView {
  return { ...user, recipes, recipes_count: recipesCount };
}
