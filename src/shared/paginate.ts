import { CountError, FetchError } from './errors.js';
import type { PageLinks } from './page-url.js';
import type { PaginationParams } from './pagination.js';
import { clamp } from './utils.js';

/**
 * A countable, deterministically ordered source that can be read one window
 * at a time. The caller owns the ordering; nothing here sorts.
 */
export interface PageQuery<T> {
  count(): Promise<number>;
  fetch(offset: number, limit: number): Promise<T[]>;
}

/**
 * One page of a larger ordered collection, with the field names it is
 * serialized under.
 */
export type PaginatedList<T> = {
  total: number;
  per_page: number;
  // Page actually returned; 1 for an empty collection
  current_page: number;
  // Always at least 1, even when the collection is empty
  last_page: number;
  first_page_url: string;
  // Empty when there is only one page
  last_page_url: string;
  // Empty on the last page
  next_page_url: string;
  // Empty on the first page
  prev_page_url: string;
  // Fully qualified URL without query string
  path: string;
  // 1-based inclusive index range of `data`; both 0 when the collection is empty
  from: number;
  to: number;
  data: T[];
};

export type PageOptions = {
  /**
   * Clamp a requested page beyond the last page onto the last page. Off by
   * default: such a request gets an empty `data` and a window computed from the
   * page as requested.
   */
  clampPage?: boolean;
};

async function countItems<T>(query: PageQuery<T>): Promise<number> {
  let total: number;
  try {
    total = await query.count();
  } catch (err) {
    throw new CountError(err);
  }
  if (!Number.isSafeInteger(total) || total < 0) {
    throw new CountError(new RangeError(`Invalid item count: ${total}`));
  }
  return total;
}

async function fetchItems<T>(query: PageQuery<T>, offset: number, limit: number): Promise<T[]> {
  try {
    return await query.fetch(offset, limit);
  } catch (err) {
    throw new FetchError(err);
  }
}

/**
 * Counts the query, fetches the requested window and derives the page
 * metadata and navigation links. The count always completes before the fetch
 * is issued, and an empty collection is never fetched.
 *
 * @throws CountError when counting fails
 * @throws FetchError when fetching the window fails
 */
export async function getPage<T>(
  query: PageQuery<T>,
  params: PaginationParams,
  links: PageLinks,
  options: PageOptions = {},
): Promise<PaginatedList<T>> {
  const { perPage } = params;
  const total = await countItems(query);
  if (total === 0) {
    return {
      total: 0,
      per_page: perPage,
      current_page: 1,
      last_page: 1,
      first_page_url: links.page(1, perPage),
      last_page_url: '',
      next_page_url: '',
      prev_page_url: '',
      path: links.path,
      from: 0,
      to: 0,
      data: [],
    };
  }

  const lastPage = Math.max(1, Math.ceil(total / perPage));
  // Pages whose window would pass MAX_SAFE_INTEGER are past the end anyway
  const maxPage = Math.max(lastPage, Math.floor(Number.MAX_SAFE_INTEGER / perPage));
  const page = clamp(params.page, 1, options.clampPage ? lastPage : maxPage);
  const prev = page - 1;
  const next = page + 1;

  const from = prev * perPage + 1;
  const to = Math.min(page * perPage, total);
  const data = await fetchItems(query, prev * perPage, perPage);

  return {
    total,
    per_page: perPage,
    current_page: page,
    last_page: lastPage,
    first_page_url: links.page(1, perPage),
    last_page_url: lastPage <= 1 ? '' : links.page(lastPage, perPage),
    next_page_url: next > lastPage ? '' : links.page(next, perPage),
    prev_page_url: prev < 1 ? '' : links.page(prev, perPage),
    path: links.path,
    from,
    to,
    data,
  };
}

/**
 * Same as {@link getPage}, with every fetched item passed through `mapper`.
 * All metadata is left as computed.
 */
export async function getPageMapped<T, V>(
  query: PageQuery<T>,
  params: PaginationParams,
  links: PageLinks,
  mapper: (item: T, index: number) => V,
  options: PageOptions = {},
): Promise<PaginatedList<V>> {
  const list = await getPage(query, params, links, options);
  return { ...list, data: list.data.map(mapper) };
}
