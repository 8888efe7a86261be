import { z } from 'zod';
import { REPLY_MAX_LENGTH } from '../../constants';
import { optionalInt } from '../../utils/validation';

const contentField = z
  .string()
  .trim()
  .min(1, 'The content field is required.')
  .max(REPLY_MAX_LENGTH, `The content may not be greater than ${REPLY_MAX_LENGTH} characters.`);

export const createReplySchema = z.object({
  content: contentField,
  parent_reply_id: optionalInt,
});

export const updateReplySchema = z.object({
  content: contentField,
});

export type CreateReplyBody = z.infer<typeof createReplySchema>;
export type UpdateReplyBody = z.infer<typeof updateReplySchema>;
