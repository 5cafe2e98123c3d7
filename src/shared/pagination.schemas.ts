import { z } from 'zod';

// page/per_page stay permissive here; resolution falls back to defaults instead of rejecting
export const paginationQuerySchema = z.object({
  page: z.union([z.string(), z.array(z.string())]).optional(),
  per_page: z.union([z.string(), z.array(z.string())]).optional(),
});

export function paginatedListSchema<T extends z.ZodType>(item: T) {
  return z.object({
    total: z.number().int().min(0),
    per_page: z.number().int().positive(),
    current_page: z.number().int().positive(),
    last_page: z.number().int().positive(),
    first_page_url: z.string(),
    last_page_url: z.string(),
    next_page_url: z.string(),
    prev_page_url: z.string(),
    path: z.string(),
    from: z.number().int(),
    to: z.number().int(),
    data: z.array(item),
  });
}
