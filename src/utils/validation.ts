import { z } from 'zod';

const TRUE_VALUES = ['true', '1', 'yes', 'on', 'y'];
const FALSE_VALUES = ['false', '0', 'no', 'off', 'n', ''];

/**
 * Accepts real booleans as well as the string forms multipart forms send.
 * Returns undefined for anything unrecognised.
 */
export const parseBoolean = (value: unknown): boolean | undefined => {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value !== 'string') return undefined;

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  return undefined;
};

// Array of strings or a comma separated string
export const parseTags = (value: unknown): string[] => {
  const raw = Array.isArray(value) ? value : typeof value === 'string' ? value.split(',') : [];
  return raw
    .filter((tag): tag is string => typeof tag === 'string')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
};

export const lenientBoolean = z.preprocess(
  (value) => parseBoolean(value) ?? value,
  z.boolean({ invalid_type_error: 'Must be a boolean' })
);

export const tagsField = z.preprocess((value) => parseTags(value), z.array(z.string().max(50)));

export const idParamSchema = z.coerce.number().int().positive();

export const parseId = (value: unknown): number | null => {
  const result = idParamSchema.safeParse(value);
  return result.success ? result.data : null;
};

export interface PageRequest {
  page: number;
  limit: number;
  offset: number;
}

export const resolvePagination = (
  query: { page?: unknown; per_page?: unknown },
  defaultLimit: number,
  maxLimit: number = 100
): PageRequest => {
  const pageResult = idParamSchema.safeParse(query.page);
  const limitResult = idParamSchema.safeParse(query.per_page);
  const page = pageResult.success ? pageResult.data : 1;
  const limit = limitResult.success ? Math.min(limitResult.data, maxLimit) : defaultLimit;
  return { page, limit, offset: (page - 1) * limit };
};

export const optionalText = (max: number) =>
  z.preprocess(
    (value) => (value === '' || value === null ? undefined : value),
    z.string().max(max).optional()
  );

const blankToUndefined = (value: unknown) =>
  value === '' || value === null || (typeof value === 'string' && value.trim() === '') ? undefined : value;

// Query string / multipart number, blank treated as absent
export const optionalNumber = z.preprocess(blankToUndefined, z.coerce.number().optional());

export const optionalInt = z.preprocess(blankToUndefined, z.coerce.number().int().optional());

export const optionalDate = z.preprocess(blankToUndefined, z.coerce.date().optional());

export const optionalBoolean = z.preprocess(blankToUndefined, lenientBoolean.optional());
