import { randomUUID } from 'node:crypto';
import { mkdir, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { ValidationError } from '../errors.ts';
import type { ImageStore, ImageUpload } from './types.ts';

/** URL prefix media files are served under. */
export const MEDIA_URL_PREFIX = '/media/';

/** Directory (relative to the media root) recipe images are written to. */
export const RECIPE_IMAGE_DIR = 'recipes/images';

const DATA_URI_PATTERN = /^data:image\/([a-z0-9.+-]+);base64,(.*)$/is;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Maps an image MIME subtype to a file extension: `svg+xml` → `svg`,
 * `x-icon` → `icon`, anything else is used as-is.
 */
export function extensionForSubtype(subtype: string): string {
  const base = subtype.toLowerCase().split('+')[0].replace(/^x-/, '');
  const extension = base.replace(/[^a-z0-9]/g, '');
  if (!extension) {
    throw new ValidationError('Unsupported image type', { image: [`Unsupported image type: ${subtype}`] });
  }
  return extension;
}

function buildUpload(data: Buffer, subtype: string): ImageUpload {
  if (data.length === 0) {
    throw new ValidationError('Image is empty', { image: ['The submitted image is empty.'] });
  }
  const extension = extensionForSubtype(subtype);
  return { data, extension, filename: `${randomUUID()}.${extension}` };
}

/**
 * Decodes a `data:image/<subtype>;base64,<payload>` string.
 */
export function decodeImageDataUri(value: string): ImageUpload {
  const match = DATA_URI_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError('Image must be a base64 data URI', {
      image: ['Expected data:image/<type>;base64,<payload> or a file upload.'],
    });
  }

  const [, subtype, payload] = match;
  const compact = payload.replace(/\s+/g, '');
  if (!BASE64_PATTERN.test(compact)) {
    throw new ValidationError('Image payload is not valid base64', { image: ['Image payload is not valid base64.'] });
  }

  return buildUpload(Buffer.from(compact, 'base64'), subtype);
}

/**
 * Wraps a natively uploaded file. `mimetype` must be an `image/*` type.
 */
export function imageFromUpload(data: Buffer, mimetype: string): ImageUpload {
  const [type, subtype] = mimetype.split(';')[0].trim().split('/');
  if (type?.toLowerCase() !== 'image' || !subtype) {
    throw new ValidationError('Uploaded file is not an image', { image: [`Unsupported content type: ${mimetype}`] });
  }
  return buildUpload(data, subtype);
}

/** Public URL of a stored media path. */
export function mediaUrl(relativePath: string): string {
  return `${MEDIA_URL_PREFIX}${relativePath.replace(/^\/+/, '')}`;
}

/**
 * Writes images below a local media root.
 */
export class LocalImageStore implements ImageStore {
  constructor(private readonly root: string) {}

  async save(upload: ImageUpload): Promise<string> {
    const relativePath = path.posix.join(RECIPE_IMAGE_DIR, upload.filename);
    const target = path.join(this.root, relativePath);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, upload.data);
    return relativePath;
  }

  async remove(relativePath: string): Promise<void> {
    const target = path.resolve(this.root, relativePath);
    if (!target.startsWith(path.resolve(this.root) + path.sep)) {
      throw new Error(`Refusing to remove path outside media root: ${relativePath}`);
    }
    try {
      await unlink(target);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return;
      throw err;
    }
  }
}
