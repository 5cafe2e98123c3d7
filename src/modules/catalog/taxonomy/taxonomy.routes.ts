import type { FastifyPluginAsync } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { TaxonomyService } from './taxonomy.service.js';
import {
    taxonomyCategoriesQuerySchema,
    taxonomyCategoriesResponseSchema,
    type TaxonomyCategory
} from './taxonomy.schemas.js';

export type TaxonomyRoutesOptions = { categories: TaxonomyCategory[] };

export const taxonomyRoutes: FastifyPluginAsync<TaxonomyRoutesOptions> = async (app, opts) => {
    const zodApp = app.withTypeProvider<ZodTypeProvider>();
    const service = new TaxonomyService(opts.categories);

    zodApp.get(
        '/',
        {
            schema: {
                description: 'Lists taxonomy categories, one page at a time',
                tags: ['catalog.taxonomy'],
                querystring: taxonomyCategoriesQuerySchema,
                response: {
                    200: taxonomyCategoriesResponseSchema
                }
            }
        },
        async (request) => {
            const list = await service.listCategories(request.pageRequest(), { type: request.query.type });
            request.log.debug({ page: list.current_page, perPage: list.per_page, total: list.total }, 'categories page computed');
            return list;
        }
    );
};
