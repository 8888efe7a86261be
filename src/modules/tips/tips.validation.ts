import { z } from 'zod';
import { optionalBoolean, optionalInt, tagsField } from '../../utils/validation';

export const TIP_SORTS = ['latest', 'popular', 'views'] as const;

export const tipFiltersSchema = z.object({
  category: optionalInt,
  search: z.string().trim().max(255).optional(),
  featured: optionalBoolean,
  sort: z.enum(TIP_SORTS).catch('latest'),
});

export const createTipSchema = z.object({
  title: z.string().trim().min(1, 'The title field is required.').max(255),
  content: z.string().trim().min(1, 'The content field is required.'),
  category_id: z.coerce.number().int().positive('The selected category id is invalid.'),
  tags: tagsField.optional(),
  is_featured: optionalBoolean,
});

export const updateTipSchema = createTipSchema.partial();

export type TipFilters = z.infer<typeof tipFiltersSchema>;
export type CreateTipBody = z.infer<typeof createTipSchema>;
export type UpdateTipBody = z.infer<typeof updateTipSchema>;
