import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { config } from '../../config/env.js';

export const CatalogSourceEnum = z.enum(['postgres', 'fixtures', 'injected']);
export type CatalogSource = z.infer<typeof CatalogSourceEnum>;

export type HealthRoutesOptions = {
    catalogSource: CatalogSource;
    categoryCount: number;
};

const HealthResponseSchema = z.object({
    status: z.literal('ok'),
    uptime: z.number(),
    env: z.string(),
    catalog: z.object({ places: CatalogSourceEnum, categories: z.number().int().min(0) }),
});

// Liveness plus where the catalog is served from
export default async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOptions) {
    const zodApp = app.withTypeProvider<ZodTypeProvider>();
    const catalog = { places: opts.catalogSource, categories: opts.categoryCount };

    zodApp.get('/health', {
        schema: { description: 'Health check endpoint', tags: ['system'], response: { 200: HealthResponseSchema } },
    }, async () => ({ status: 'ok' as const, uptime: process.uptime(), env: config.NODE_ENV, catalog }));

    zodApp.get('/version', {
        schema: { description: 'Returns service version', tags: ['system'], response: { 200: z.object({ version: z.string() }) } },
    }, async () => ({ version: config.SWAGGER_VERSION }));
}
