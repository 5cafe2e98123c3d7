// Environment validation using Zod
import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  // Swagger/metadata
  SWAGGER_TITLE: z.string().default('Paged Catalog API'),
  SWAGGER_VERSION: z.string().default('0.1.0'),

  // Database; without it the catalog is served from the JSON fixtures
  DATABASE_URL: z.string().url().or(z.string().startsWith('postgresql://')).optional(),
  PLACES_FIXTURE_PATH: z.string().default('data/places.json'),
  CATEGORIES_FIXTURE_PATH: z.string().default('data/categories.json'),

  CORS_ORIGINS: z.string().default('http://localhost:3000,http://127.0.0.1:3000'),
  // Honour X-Forwarded-* when building page links; enable only behind a proxy
  TRUST_PROXY: booleanFlag,

  // Pagination defaults applied to missing or invalid page/per_page
  PAGINATION_DEFAULT_PAGE: z.coerce.number().int().positive().default(1),
  PAGINATION_DEFAULT_PER_PAGE: z.coerce.number().int().positive().default(10),
  // Clamp requests beyond the last page onto the last page
  PAGINATION_CLAMP_PAGE: booleanFlag,
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.flattenError(parsed.error));
  throw new Error('ENV validation failed');
}

function defaultLogLevel(env: AppEnv['NODE_ENV']) {
  if (env === 'production') return 'info';
  if (env === 'test') return 'silent';
  return 'debug';
}

type AppEnv = z.infer<typeof EnvSchema>;

export const config = {
  ...parsed.data,
  LOG_LEVEL: parsed.data.LOG_LEVEL ?? defaultLogLevel(parsed.data.NODE_ENV),
  corsOrigins: parsed.data.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
};
