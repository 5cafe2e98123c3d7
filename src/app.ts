import Fastify from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import fastifySwagger from '@fastify/swagger';
import fastifySwaggerUI from '@fastify/swagger-ui';
import {
  ZodTypeProvider,
  jsonSchemaTransform,
  jsonSchemaTransformObject,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import databasePlugin from './plugins/database.js';
import paginationPlugin from './plugins/pagination.js';
import logger from './plugins/logger.js';
import registerModules, { type ModuleDeps } from './modules/index.js';
import {
  InMemoryPlaceRepository,
  KyselyPlaceRepository,
  loadPlaceFixtures,
} from './modules/catalog/places/place.repository.js';
import { loadCategories } from './modules/catalog/taxonomy/taxonomy.service.js';
import { toErrorResponse } from './shared/errors.js';
import { config } from './config/env.js';

export type AppOptions = Partial<Omit<ModuleDeps, 'catalogSource'>> & { trustProxy?: boolean };

// Factory that creates and configures Fastify instance (app-level setup).
// Tests pass their own data sources through `opts`.
export async function createApp(opts: AppOptions = {}) {
  const app = Fastify({
    loggerInstance: logger,
    trustProxy: opts.trustProxy ?? config.TRUST_PROXY,
  }).withTypeProvider<ZodTypeProvider>();
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.setErrorHandler((err, req, reply) => {
    const { statusCode, body } = toErrorResponse(err);
    if (statusCode >= 500) req.log.error({ err }, 'request failed');
    else req.log.debug({ err }, 'request rejected');
    return reply.code(statusCode).send(body);
  });

  const allowedOrigins = new Set(config.corsOrigins);
  await app.register(cors, {
    origin: (origin, cb) => {
      if (!origin) return cb(null, true);
      if (allowedOrigins.has(origin)) return cb(null, origin);
      return cb(new Error('Origin not allowed by CORS'), false);
    },
  });
  await app.register(rateLimit, { max: 100, timeWindow: '1 minute' });
  await app.register(fastifySwagger, {
    openapi: {
      info: {
        title: config.SWAGGER_TITLE,
        version: config.SWAGGER_VERSION,
        description: 'Catalog API with page/per_page pagination. Every list response carries totals, item ranges and first/last/next/previous page links.',
      },
      servers: [
        { url: '/', description: 'Current host' },
      ],
      tags: [
        { name: 'system', description: 'Health and service info' },
        { name: 'catalog.places', description: 'Places catalog' },
        { name: 'catalog.taxonomy', description: 'Taxonomy and categories' },
      ],
    },
    transform: jsonSchemaTransform,
    transformObject: jsonSchemaTransformObject,
  });
  await app.register(fastifySwaggerUI, {
    routePrefix: '/docs',
  });

  await app.register(databasePlugin, { url: config.DATABASE_URL });
  await app.register(paginationPlugin, {
    defaultPage: config.PAGINATION_DEFAULT_PAGE,
    defaultPerPage: config.PAGINATION_DEFAULT_PER_PAGE,
    clampPage: config.PAGINATION_CLAMP_PAGE,
  });

  let catalogSource: ModuleDeps['catalogSource'] = 'injected';
  let placeRepository = opts.placeRepository;
  if (!placeRepository && app.db) {
    placeRepository = new KyselyPlaceRepository(app.db);
    catalogSource = 'postgres';
  } else if (!placeRepository) {
    placeRepository = new InMemoryPlaceRepository(loadPlaceFixtures(config.PLACES_FIXTURE_PATH));
    catalogSource = 'fixtures';
  }
  const categories = opts.categories ?? loadCategories(config.CATEGORIES_FIXTURE_PATH);

  // Register all domain modules (routes)
  await app.register(registerModules, { placeRepository, categories, catalogSource });

  return app;
}
