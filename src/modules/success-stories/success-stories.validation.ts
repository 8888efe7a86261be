import { z } from 'zod';
import { optionalBoolean, optionalInt, optionalNumber, optionalText } from '../../utils/validation';

export const STORY_SORTS = ['latest', 'popular', 'views'] as const;

export const storyFiltersSchema = z.object({
  search: z.string().trim().max(255).optional(),
  crop_type: z.string().trim().max(255).optional(),
  featured: optionalBoolean,
  sort: z.enum(STORY_SORTS).catch('latest'),
});

// captions[i] arrives as an array, a lone `captions` field as a string
const captionsField = z.preprocess(
  (value) => (typeof value === 'string' ? [value] : value),
  z.array(z.string().max(255, 'The caption may not be greater than 255 characters.').nullable()).optional()
);

export const createStorySchema = z.object({
  title: z.string().trim().min(1, 'The title field is required.').max(255),
  content: z.string().trim().min(1, 'The content field is required.'),
  location: optionalText(255),
  crop_type: optionalText(255),
  yield_improvement: optionalNumber.refine((value) => value === undefined || value >= 0, {
    message: 'The yield improvement must be at least 0.',
  }),
  yield_unit: optionalText(50),
  captions: captionsField,
});

export const updateStorySchema = createStorySchema.partial();

export const createCommentSchema = z.object({
  comment: z.string().trim().min(1, 'The comment field is required.'),
  parent_id: optionalInt,
});

export type StoryFilters = z.infer<typeof storyFiltersSchema>;
export type CreateStoryBody = z.infer<typeof createStorySchema>;
export type UpdateStoryBody = z.infer<typeof updateStorySchema>;
export type CreateCommentBody = z.infer<typeof createCommentSchema>;
