/** A decoded image ready to be stored. */
export interface ImageUpload {
  data: Buffer;
  /** File extension without the dot, derived from the MIME subtype. */
  extension: string;
  /** Synthesized unique filename, e.g. `3f1c….png`. */
  filename: string;
}

/**
 * Storage backend for recipe images. Paths are relative to the media root.
 */
export interface ImageStore {
  save(upload: ImageUpload): Promise<string>;
  remove(relativePath: string): Promise<void>;
}
