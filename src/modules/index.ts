import { FastifyInstance } from 'fastify';
import healthRoutes, { type CatalogSource } from './system/health.routes.js';
import placesRoutes from './catalog/places/place.routes.js';
import { taxonomyRoutes } from './catalog/taxonomy/taxonomy.routes.js';
import type { PlaceRepository } from './catalog/places/place.repository.js';
import type { TaxonomyCategory } from './catalog/taxonomy/taxonomy.schemas.js';

export type ModuleDeps = {
  placeRepository: PlaceRepository;
  categories: TaxonomyCategory[];
  catalogSource: CatalogSource;
};

// Registers all domain modules and their route prefixes
export default async function registerModules(app: FastifyInstance, deps: ModuleDeps) {
  await app.register(healthRoutes, { catalogSource: deps.catalogSource, categoryCount: deps.categories.length });
  await app.register(placesRoutes, { prefix: '/api/places', repository: deps.placeRepository });
  await app.register(taxonomyRoutes, { prefix: '/api/categories', categories: deps.categories });
}
