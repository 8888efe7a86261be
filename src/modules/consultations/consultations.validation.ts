import { z } from 'zod';

export const createConsultationSchema = z.object({
  expert_id: z.coerce.number().int().positive('The selected expert id is invalid.'),
  consultation_date: z.coerce
    .date({ invalid_type_error: 'The consultation date is not a valid date.' })
    .refine((date) => date.getTime() > Date.now(), 'The consultation date must be a date after now.'),
  description: z.string().trim().min(1, 'The description field is required.'),
});

export const acceptConsultationSchema = z.object({
  expert_notes: z.string().nullish(),
});

export const declineConsultationSchema = z.object({
  decline_reason: z.string().trim().min(1, 'The decline reason field is required.'),
});
