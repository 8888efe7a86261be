/**
 * `json_build_object` of the public user fields embedded in other resources.
 * Yields NULL when the joined row is missing.
 */
export const userSummaryJson = (alias: string): string => `
  CASE WHEN ${alias}.id IS NULL THEN NULL ELSE json_build_object(
    'id', ${alias}.id,
    'name', ${alias}.name,
    'username', ${alias}.username,
    'image_url', ${alias}.image_url,
    'location', ${alias}.location,
    'role', ${alias}.role
  ) END`;

export const PUBLIC_USER_COLUMNS =
  'id, name, username, email, phone_number, image_url, location, role, favorites, created_at, updated_at';

/**
 * Escapes LIKE wildcards so user input matches literally
 */
export const likePattern = (term: string): string => `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
