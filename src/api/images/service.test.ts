import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { ValidationError } from '../errors.ts';
import { LocalImageStore, decodeImageDataUri, extensionForSubtype, imageFromUpload, mediaUrl } from './service.ts';

// 1x1 transparent PNG
const PNG_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=';

describe('extensionForSubtype', () => {
  it('maps common subtypes', () => {
    expect(extensionForSubtype('png')).toBe('png');
    expect(extensionForSubtype('svg+xml')).toBe('svg');
    expect(extensionForSubtype('x-icon')).toBe('icon');
    expect(extensionForSubtype('JPEG')).toBe('jpeg');
  });
});

describe('decodeImageDataUri', () => {
  it('decodes a base64 data URI', () => {
    const upload = decodeImageDataUri(`data:image/png;base64,${PNG_BASE64}`);
    expect(upload.extension).toBe('png');
    expect(upload.filename).toMatch(/^[0-9a-f-]{36}\.png$/);
    expect(upload.data.equals(Buffer.from(PNG_BASE64, 'base64'))).toBe(true);
  });

  it('rejects other strings', () => {
    expect(() => decodeImageDataUri('https://example.com/cat.png')).toThrow(ValidationError);
    expect(() => decodeImageDataUri('data:text/plain;base64,aGVsbG8=')).toThrow(ValidationError);
  });

  it('rejects payloads that are not base64', () => {
    expect(() => decodeImageDataUri('data:image/png;base64,@@@')).toThrow('Image payload is not valid base64');
  });

  it('rejects empty payloads', () => {
    expect(() => decodeImageDataUri('data:image/png;base64,')).toThrow(ValidationError);
  });
});

describe('imageFromUpload', () => {
  it('accepts image content types', () => {
    expect(imageFromUpload(Buffer.from('gif'), 'image/gif').extension).toBe('gif');
  });

  it('rejects non-image content types', () => {
    expect(() => imageFromUpload(Buffer.from('text'), 'text/plain')).toThrow('Uploaded file is not an image');
  });
});

describe('mediaUrl', () => {
  it('prefixes stored paths with the media url', () => {
    expect(mediaUrl('recipes/images/a.png')).toBe('/media/recipes/images/a.png');
    expect(mediaUrl('/recipes/images/a.png')).toBe('/media/recipes/images/a.png');
  });
});

describe('LocalImageStore', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'recipe-images-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes uploads below the recipe image directory', async () => {
    const store = new LocalImageStore(root);
    const saved = await store.save({ data: Buffer.from('pixels'), extension: 'png', filename: 'a.png' });

    expect(saved).toBe('recipes/images/a.png');
    expect(await readFile(path.join(root, saved), 'utf-8')).toBe('pixels');
  });

  it('removes stored files and ignores missing ones', async () => {
    const store = new LocalImageStore(root);
    const saved = await store.save({ data: Buffer.from('pixels'), extension: 'png', filename: 'b.png' });

    await store.remove(saved);
    await expect(stat(path.join(root, saved))).rejects.toThrow();
    await expect(store.remove(saved)).resolves.toBeUndefined();
  });

  it('refuses to remove files outside the media root', async () => {
    const store = new LocalImageStore(root);
    await expect(store.remove('../outside.png')).rejects.toThrow('outside media root');
  });
});
