/**
 * User types for the users API.
 *
 * Property names use snake_case to match the wire format.
 */

import type { RecipeSummary } from '../recipes/types.ts';

/** A user row joined with the caller's subscription state. */
export interface UserRow {
  id: number;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  is_subscribed: boolean;
}

/** Public user representation. */
export interface UserView {
  id: number;
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  is_subscribed: boolean;
}

/** Response body of user registration. */
export type CreatedUserView = Omit<UserView, 'is_subscribed'>;

/** A followed author with a preview of their recipes. */
export interface FollowView extends UserView {
  recipes: RecipeSummary[];
  recipes_count: number;
}

export interface CreateUserInput {
  email: string;
  username: string;
  first_name: string;
  last_name: string;
  password: string;
}

export interface SetPasswordInput {
  current_password: string;
  new_password: string;
}

export interface ListUsersResult {
  users: UserView[];
  total: number;
}

export interface ListSubscriptionsResult {
  authors: FollowView[];
  total: number;
}
