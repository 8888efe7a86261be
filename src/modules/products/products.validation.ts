import { z } from 'zod';
import { optionalBoolean, optionalDate, optionalInt, optionalNumber } from '../../utils/validation';

export const productFiltersSchema = z.object({
  min_price: optionalNumber,
  max_price: optionalNumber,
  category_id: optionalInt,
  created_after: optionalDate,
  created_before: optionalDate,
});

// Multipart fields arrive as strings, hence the coercion
export const createProductSchema = z.object({
  name: z.string().trim().min(1, 'The name field is required.').max(255),
  description: z.string().trim().min(1, 'The description field is required.'),
  price: z.coerce.number({ invalid_type_error: 'The price must be a number.' }).nonnegative(),
  category_id: z.coerce.number().int().positive('The selected category id is invalid.'),
  is_featured: optionalBoolean,
  stock: optionalInt.pipe(z.number().int().nonnegative().optional()),
  location: z.string().max(255).optional(),
});

export const updateProductSchema = z.object({
  name: z.string().trim().min(1).max(255).optional(),
  description: z.string().trim().min(1).optional(),
  price: optionalNumber.pipe(z.number().nonnegative().optional()),
  category_id: optionalInt.pipe(z.number().int().positive().optional()),
  is_featured: optionalBoolean,
  stock: optionalInt.pipe(z.number().int().nonnegative().optional()),
  location: z.string().max(255).optional(),
});

export type ProductFilters = z.infer<typeof productFiltersSchema>;
export type UpdateProductBody = z.infer<typeof updateProductSchema>;
