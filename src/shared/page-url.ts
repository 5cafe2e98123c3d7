// Navigation link construction for paginated responses
import { AppError } from './errors.js';

export const PAGE_QUERY_KEYS = ['page', 'per_page'] as const;

// What a page computation needs to know about the current request
export interface PageLinks {
  // Absolute request URL without query string
  readonly path: string;
  // Absolute request URL with page and per_page overwritten
  page(page: number, perPage: number): string;
}

export type RequestLike = {
  protocol: string;
  host: string;
  url: string;
};

// Absolute URL of the request as the client addressed it
export function requestUrl(req: RequestLike): URL {
  try {
    return new URL(req.url, `${req.protocol}://${req.host}`);
  } catch (err) {
    throw new AppError('Invalid request host', 400, { code: 'INVALID_REQUEST_URL', cause: err });
  }
}

export function requestBase(url: URL): string {
  const u = new URL(url);
  u.search = '';
  u.hash = '';
  return u.toString();
}

export function setPageQuery(url: URL, page: number, perPage: number): URLSearchParams {
  const query = new URLSearchParams(url.search);
  query.set('page', String(page));
  query.set('per_page', String(perPage));
  return query;
}

export function newPageUrl(url: URL, page: number, perPage: number): string {
  const u = new URL(url);
  u.search = setPageQuery(url, page, perPage).toString();
  u.hash = '';
  return u.toString();
}

export function removeQuery(url: URL, names: readonly string[] = PAGE_QUERY_KEYS): string {
  const u = new URL(url);
  for (const name of names) u.searchParams.delete(name);
  u.hash = '';
  return u.toString();
}

export function pageLinksFor(url: URL | string): PageLinks {
  const base = typeof url === 'string' ? new URL(url) : url;
  return {
    path: requestBase(base),
    page: (page, perPage) => newPageUrl(base, page, perPage),
  };
}
