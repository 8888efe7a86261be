/**
 * URL slug: lower case ASCII words joined by dashes.
 */
export const slugify = (text: string): string =>
  text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

/**
 * First free slug among `base`, `base-1`, `base-2`, ...
 */
export const uniqueSlug = async (
  text: string,
  isTaken: (candidate: string) => Promise<boolean>,
  fallback: string = 'item'
): Promise<string> => {
  const base = slugify(text) || fallback;
  let candidate = base;
  let suffix = 1;

  while (await isTaken(candidate)) {
    candidate = `${base}-${suffix}`;
    suffix++;
  }

  return candidate;
};
