// Fastify plugin binding pagination to requests: resolved page/per_page from the
// query string and navigation links built from the request URL
import fp from 'fastify-plugin';
import type { FastifyRequest } from 'fastify';
import type { PageOptions } from '../shared/paginate.js';
import { pageLinksFor, requestUrl, type PageLinks } from '../shared/page-url.js';
import {
  DEFAULT_PAGE,
  DEFAULT_PER_PAGE,
  getPaginationParams,
  type PaginationParams,
} from '../shared/pagination.js';

// Everything a listing needs from the request to compute one page
export type PageRequest = {
  params: PaginationParams;
  links: PageLinks;
  options: PageOptions;
};

declare module 'fastify' {
  interface FastifyRequest {
    pageRequest(): PageRequest;
  }
}

export type PaginationPluginOptions = {
  defaultPage?: number;
  defaultPerPage?: number;
  clampPage?: boolean;
};

const paginationPlugin = fp<PaginationPluginOptions>(async (app, opts) => {
  const defaults = {
    page: opts.defaultPage ?? DEFAULT_PAGE,
    perPage: opts.defaultPerPage ?? DEFAULT_PER_PAGE,
  };
  const options: PageOptions = { clampPage: opts.clampPage ?? false };

  app.decorateRequest('pageRequest', function (this: FastifyRequest): PageRequest {
    return {
      params: getPaginationParams(this.query, defaults),
      links: pageLinksFor(requestUrl(this)),
      options,
    };
  });
}, { name: 'pagination' });

export default paginationPlugin;
