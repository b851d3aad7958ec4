export type * from './types.ts';
export { createUserSchema, setPasswordSchema, MIN_PASSWORD_LENGTH } from './schemas.ts';
export {
  listUsers,
  getUser,
  createUser,
  setPassword,
  listSubscriptions,
  subscribe,
  unsubscribe,
} from './service.ts';
export { toUserView, toCreatedUserView, toFollowView } from './views.ts';
