import { z } from 'zod';
import { paginatedListSchema, paginationQuerySchema } from '../../../shared/pagination.schemas.js';

export const PriceTierEnum = z.enum(['FREE', 'CHEAP', 'MODERATE', 'EXPENSIVE']);

// Row shape as stored in data/places.json
export const PlaceFixtureSchema = z.object({
    id: z.string().uuid(),
    name: z.string().min(1),
    city_code: z.string().min(2).max(10),
    category: z.string().min(1),
    address: z.string().min(1),
    lat: z.number().min(-90).max(90),
    lon: z.number().min(-180).max(180),
    price_tier: PriceTierEnum.nullable(),
    source_ref: z.string().nullable(),
    internal_score: z.number(),
    created_at: z.iso.datetime(),
});

export const PlaceListQuerySchema = paginationQuerySchema.extend({
    city: z.string().min(2).max(10).optional(),
    category: z.string().min(1).optional(),
});

// Public projection of a place
export const PlaceViewSchema = z.object({
    id: z.string(),
    name: z.string(),
    cityCode: z.string(),
    category: z.string(),
    address: z.string(),
    geo: z.object({ lat: z.number(), lon: z.number() }),
    priceTier: PriceTierEnum.nullable(),
    createdAt: z.string(),
});
export type PlaceView = z.infer<typeof PlaceViewSchema>;

export const PlaceListResponseSchema = paginatedListSchema(PlaceViewSchema);
