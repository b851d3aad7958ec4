export type { ImageStore, ImageUpload } from './types.ts';
export {
  MEDIA_URL_PREFIX,
  RECIPE_IMAGE_DIR,
  LocalImageStore,
  decodeImageDataUri,
  extensionForSubtype,
  imageFromUpload,
  mediaUrl,
} from './service.ts';
