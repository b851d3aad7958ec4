/** Page-number pagination query parameters. */
export interface PaginationQuery {
  page?: string;
  limit?: string;
}

export interface Pagination {
  page: number;
  limit: number;
  offset: number;
}

/** Paginated list response. */
export interface Page<T> {
  count: number;
  next: string | null;
  previous: string | null;
  results: T[];
}

export const DEFAULT_PAGE_SIZE = 6;
export const MAX_PAGE_SIZE = 100;

/** Largest value of a Postgres `integer` column. */
export const MAX_INT4 = 2147483647;

export function parsePagination(query: PaginationQuery): Pagination {
  const rawPage = parseInt(query.page ?? '', 10);
  const rawLimit = parseInt(query.limit ?? '', 10);
  const page = Number.isFinite(rawPage) && rawPage > 0 ? rawPage : 1;
  const limit = Number.isFinite(rawLimit) && rawLimit > 0 ? Math.min(rawLimit, MAX_PAGE_SIZE) : DEFAULT_PAGE_SIZE;
  return { page, limit, offset: (page - 1) * limit };
}

/**
 * Rewrites the `page` parameter of a request URL (path + query string).
 * Page 1 drops the parameter.
 */
export function pageUrl(url: string, page: number): string {
  const [path, search = ''] = url.split('?', 2);
  const params = new URLSearchParams(search);
  if (page <= 1) {
    params.delete('page');
  } else {
    params.set('page', String(page));
  }
  const qs = params.toString();
  return qs ? `${path}?${qs}` : path;
}

export function buildPage<T>(url: string, pagination: Pagination, count: number, results: T[]): Page<T> {
  const { page, limit } = pagination;
  return {
    count,
    next: page * limit < count ? pageUrl(url, page + 1) : null,
    previous: page > 1 ? pageUrl(url, page - 1) : null,
    results,
  };
}

/** Parses a positive `integer`-column id from a route or query parameter, or returns null. */
export function parseId(raw: string | undefined): number | null {
  if (raw === undefined || !/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return id > 0 && id <= MAX_INT4 ? id : null;
}
