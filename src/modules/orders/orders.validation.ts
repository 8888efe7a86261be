import { z } from 'zod';
import { ORDER_STATUSES } from '../../constants';

export const createOrderSchema = z.object({
  items: z
    .array(
      z.object({
        product_id: z.coerce.number().int().positive('The selected product is invalid.'),
        quantity: z.coerce.number().int().min(1, 'The quantity must be at least 1.'),
      })
    )
    .min(1, 'The items field must have at least 1 item.'),
  shipping_address: z.string().trim().min(1, 'The shipping address field is required.'),
  phone_number: z.string().trim().min(1, 'The phone number field is required.').max(20),
  notes: z.string().nullish(),
});

export const updateStatusSchema = z.object({
  status: z.enum(ORDER_STATUSES, {
    errorMap: () => ({ message: 'The selected status is invalid.' }),
  }),
});

export type CreateOrderBody = z.infer<typeof createOrderSchema>;
