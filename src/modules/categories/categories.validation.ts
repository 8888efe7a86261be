import { z } from 'zod';

export const createCategorySchema = z.object({
  name: z.string().trim().min(1, 'The name field is required.').max(255),
  description: z.string().nullish(),
});

export const updateCategorySchema = createCategorySchema.partial();
