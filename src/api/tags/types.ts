/** A recipe tag (reference data). */
export interface Tag {
  id: number;
  name: string;
  /** Display color as `#RRGGBB`. */
  color: string;
  slug: string;
}
