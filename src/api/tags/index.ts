export type { Tag } from './types.ts';
export { listTags, getTag } from './service.ts';
