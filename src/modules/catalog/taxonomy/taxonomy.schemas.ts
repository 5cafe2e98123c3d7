import { z } from 'zod';
import { paginatedListSchema, paginationQuerySchema } from '../../../shared/pagination.schemas.js';

export const taxonomyCategoryTypeSchema = z.enum(['EVENT', 'PLACE', 'TAG']);

export const taxonomyCategorySchema = z.object({
    name: z.string(),
    slug: z.string(),
    type: taxonomyCategoryTypeSchema,
});

export const taxonomyCategoriesQuerySchema = paginationQuerySchema.extend({
    // optional: can be filtered by type
    type: taxonomyCategoryTypeSchema.optional()
});

export const taxonomyCategoriesResponseSchema = paginatedListSchema(taxonomyCategorySchema);

export type TaxonomyCategory = z.infer<typeof taxonomyCategorySchema>;
export type TaxonomyCategoryType = z.infer<typeof taxonomyCategoryTypeSchema>;
