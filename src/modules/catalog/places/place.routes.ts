import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { PlaceListQuerySchema, PlaceListResponseSchema } from './place.schemas.js';
import { PlaceService } from './place.service.js';
import type { PlaceRepository } from './place.repository.js';

export type PlaceRoutesOptions = { repository: PlaceRepository };

export default async function placeRoutes(app: FastifyInstance, opts: PlaceRoutesOptions) {
    const zodApp = app.withTypeProvider<ZodTypeProvider>();
    const service = new PlaceService(opts.repository);

    zodApp.get('/', {
        schema: {
            description: 'Lists places, oldest first, one page at a time',
            tags: ['catalog.places'],
            querystring: PlaceListQuerySchema,
            response: { 200: PlaceListResponseSchema }
        }
    }, async (req) => {
        const page = req.pageRequest();
        const list = await service.listPlaces({ cityCode: req.query.city, category: req.query.category }, page);
        req.log.debug({ page: list.current_page, perPage: list.per_page, total: list.total }, 'places page computed');
        return list;
    });
}
