// Resolution of raw page/per_page input into positive pagination parameters.
// Malformed input never fails a request; it falls back to the defaults.

export const DEFAULT_PAGE = 1;
export const DEFAULT_PER_PAGE = 10;

export type PaginationParams = {
  page: number;
  perPage: number;
};

export type PaginationDefaults = {
  page: number;
  perPage: number;
};

export type PaginationQuery = {
  page?: unknown;
  per_page?: unknown;
};

const INTEGER_RE = /^[+-]?\d+$/;

// Parses a positive integer out of a query value, a repeated query value or a number
export function parsePositiveInt(raw: unknown): number | undefined {
  const value = Array.isArray(raw) ? raw[0] : raw;
  let n: number | undefined;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string') {
    const trimmed = value.trim();
    if (INTEGER_RE.test(trimmed)) n = Number(trimmed);
  }
  if (n === undefined || !Number.isSafeInteger(n) || n < 1) return undefined;
  return n;
}

export function resolvePaginationWithDefault(
  rawPage: unknown,
  rawPerPage: unknown,
  defaultPage: number,
  defaultPerPage: number,
): PaginationParams {
  return {
    page: parsePositiveInt(rawPage) ?? defaultPage,
    perPage: parsePositiveInt(rawPerPage) ?? defaultPerPage,
  };
}

/**
 * Resolves page and per_page with the fixed defaults of page `1` and `10`
 * items per page.
 */
export function resolvePagination(rawPage: unknown, rawPerPage: unknown): PaginationParams {
  return resolvePaginationWithDefault(rawPage, rawPerPage, DEFAULT_PAGE, DEFAULT_PER_PAGE);
}

/**
 * Reads the `page` and `per_page` parameters out of a decoded query string.
 * Anything else in the query is ignored.
 */
export function getPaginationParams(
  query: unknown,
  defaults: PaginationDefaults = { page: DEFAULT_PAGE, perPage: DEFAULT_PER_PAGE },
): PaginationParams {
  const q: PaginationQuery = typeof query === 'object' && query !== null ? query : {};
  return resolvePaginationWithDefault(q.page, q.per_page, defaults.page, defaults.perPage);
}
