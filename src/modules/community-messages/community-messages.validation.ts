import { z } from 'zod';
import { MESSAGE_MAX_LENGTH } from '../../constants';
import { optionalBoolean, optionalDate, optionalInt, optionalText, tagsField } from '../../utils/validation';

export const messageFiltersSchema = z.object({
  category: z.string().trim().max(100).optional(),
  search: z.string().trim().max(255).optional(),
  pinned: optionalBoolean,
  announcement: optionalBoolean,
  last_updated: optionalDate,
});

export const pollQuerySchema = z.object({
  last_id: optionalInt.transform((value) => value ?? 0),
  last_updated: optionalDate,
});

export const latestQuerySchema = pollQuerySchema.pick({ last_id: true });

export const createMessageSchema = z.object({
  title: optionalText(255),
  content: z
    .string()
    .trim()
    .min(1, 'The content field is required.')
    .max(MESSAGE_MAX_LENGTH, `The content may not be greater than ${MESSAGE_MAX_LENGTH} characters.`),
  category: optionalText(100),
  tags: tagsField.optional(),
  is_pinned: optionalBoolean,
  is_announcement: optionalBoolean,
});

export const updateMessageSchema = createMessageSchema.partial();

export type MessageFilters = z.infer<typeof messageFiltersSchema>;
export type PollQuery = z.infer<typeof pollQuerySchema>;
export type CreateMessageBody = z.infer<typeof createMessageSchema>;
export type UpdateMessageBody = z.infer<typeof updateMessageSchema>;
