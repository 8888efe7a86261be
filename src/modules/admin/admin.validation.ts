import { z } from 'zod';
import { optionalDate } from '../../utils/validation';

export const statsQuerySchema = z
  .object({
    start_date: optionalDate,
    end_date: optionalDate,
  })
  .refine((query) => !query.start_date || !query.end_date || query.start_date <= query.end_date, {
    message: 'The end date must be a date after or equal to start date.',
    path: ['end_date'],
  });

export type StatsQuery = z.infer<typeof statsQuerySchema>;
