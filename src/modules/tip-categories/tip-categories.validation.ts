import { z } from 'zod';

export const createTipCategorySchema = z.object({
  name: z.string().trim().min(1, 'The name field is required.').max(255),
  description: z.string().nullish(),
  icon: z.string().max(255).nullish(),
});

export const updateTipCategorySchema = createTipCategorySchema.partial();
