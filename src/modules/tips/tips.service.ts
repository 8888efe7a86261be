import { pool } from '../../connections';
import type { Tip, TipWithRelations } from '../../connections/db/models';
import { HttpError } from '../../utils/errors';
import { likePattern, userSummaryJson } from '../../utils/sql';
import { uniqueSlug } from '../../utils/slug';
import type { PageRequest } from '../../utils/validation';
import type { CreateTipBody, TipFilters, UpdateTipBody } from './tips.validation';

// `viewer` is the placeholder holding the caller's id, NULL for guests
const tipColumns = (viewer: string) => `
  t.*,
  ${userSummaryJson('u')} AS user,
  CASE WHEN tc.id IS NULL THEN NULL
       ELSE json_build_object('id', tc.id, 'name', tc.name, 'slug', tc.slug)
  END AS category,
  (SELECT COUNT(*)::int FROM saved_tips sv WHERE sv.tip_id = t.id) AS saves_count,
  CASE WHEN ${viewer}::int IS NULL THEN FALSE
       ELSE EXISTS (SELECT 1 FROM tip_likes tl WHERE tl.tip_id = t.id AND tl.user_id = ${viewer}::int)
  END AS is_liked,
  CASE WHEN ${viewer}::int IS NULL THEN FALSE
       ELSE EXISTS (SELECT 1 FROM saved_tips st WHERE st.tip_id = t.id AND st.user_id = ${viewer}::int)
  END AS is_saved`;

const TIP_FROM = `
  FROM tips t
  LEFT JOIN users u ON u.id = t.user_id
  LEFT JOIN tip_categories tc ON tc.id = t.category_id`;

const ORDER_BY: Record<TipFilters['sort'], string> = {
  latest: 't.created_at DESC, t.id DESC',
  popular: 't.likes_count DESC, t.created_at DESC, t.id DESC',
  views: 't.views_count DESC, t.created_at DESC, t.id DESC',
};

export interface TipListOptions {
  viewerId: number | null;
  filters?: Partial<TipFilters>;
  authorId?: number;
  savedBy?: number;
  page: PageRequest;
}

export interface TipPage {
  tips: TipWithRelations[];
  total: number;
}

export const listTips = async ({ viewerId, filters = {}, authorId, savedBy, page }: TipListOptions): Promise<TipPage> => {
  const params: unknown[] = [];
  const conditions = ['t.deleted_at IS NULL'];
  let join = '';

  if (filters.category !== undefined) {
    params.push(filters.category);
    conditions.push(`t.category_id = $${params.length}`);
  }
  if (filters.search) {
    params.push(likePattern(filters.search));
    const p = `$${params.length}`;
    conditions.push(`(t.title ILIKE ${p} OR t.content ILIKE ${p} OR t.tags::text ILIKE ${p})`);
  }
  if (filters.featured) {
    conditions.push('t.is_featured = TRUE');
  }
  if (authorId !== undefined) {
    params.push(authorId);
    conditions.push(`t.user_id = $${params.length}`);
  }
  if (savedBy !== undefined) {
    params.push(savedBy);
    join = `JOIN saved_tips saved ON saved.tip_id = t.id AND saved.user_id = $${params.length}`;
  }

  const where = `WHERE ${conditions.join(' AND ')}`;
  const orderBy = savedBy !== undefined ? 'saved.created_at DESC, t.id DESC' : ORDER_BY[filters.sort ?? 'latest'];

  const countResult = await pool.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count ${TIP_FROM} ${join} ${where}`,
    params
  );

  const n = params.length;
  const result = await pool.query<TipWithRelations>(
    `SELECT ${tipColumns(`$${n + 1}`)} ${TIP_FROM} ${join} ${where}
     ORDER BY ${orderBy}
     LIMIT $${n + 2} OFFSET $${n + 3}`,
    [...params, viewerId, page.limit, page.offset]
  );

  return { tips: result.rows, total: countResult.rows[0].count };
};

export const findTip = async (id: number, viewerId: number | null): Promise<TipWithRelations | null> => {
  const result = await pool.query<TipWithRelations>(
    `SELECT ${tipColumns('$2')} ${TIP_FROM} WHERE t.id = $1 AND t.deleted_at IS NULL`,
    [id, viewerId]
  );
  return result.rows[0] ?? null;
};

/**
 * Counts a view and returns the tip, or null when it does not exist
 */
export const viewTip = async (id: number, viewerId: number | null): Promise<TipWithRelations | null> => {
  const viewed = await pool.query(
    'UPDATE tips SET views_count = views_count + 1 WHERE id = $1 AND deleted_at IS NULL RETURNING id',
    [id]
  );
  if (viewed.rows.length === 0) {
    return null;
  }
  return findTip(id, viewerId);
};

const assertTipCategoryExists = async (categoryId: number) => {
  const result = await pool.query('SELECT 1 FROM tip_categories WHERE id = $1', [categoryId]);
  if (result.rows.length === 0) {
    throw HttpError.unprocessable('The selected category id is invalid.', {
      category_id: ['The selected category id is invalid.'],
    });
  }
};

const slugTaken = async (candidate: string) =>
  (await pool.query('SELECT 1 FROM tips WHERE slug = $1', [candidate])).rows.length > 0;

export const createTip = async (userId: number, input: CreateTipBody): Promise<TipWithRelations | null> => {
  await assertTipCategoryExists(input.category_id);
  const slug = await uniqueSlug(input.title, slugTaken, 'tip');

  const result = await pool.query<{ id: number }>(
    `INSERT INTO tips (user_id, category_id, title, slug, content, tags, is_featured)
     VALUES ($1, $2, $3, $4, $5, $6, $7)
     RETURNING id`,
    [
      userId,
      input.category_id,
      input.title,
      slug,
      input.content,
      JSON.stringify(input.tags ?? []),
      input.is_featured ?? false,
    ]
  );

  return findTip(result.rows[0].id, userId);
};

export const findOwnedTip = async (id: number): Promise<Tip | null> => {
  const result = await pool.query<Tip>('SELECT * FROM tips WHERE id = $1 AND deleted_at IS NULL', [id]);
  return result.rows[0] ?? null;
};

export const updateTip = async (tip: Tip, viewerId: number, input: UpdateTipBody): Promise<TipWithRelations | null> => {
  if (input.category_id !== undefined) {
    await assertTipCategoryExists(input.category_id);
  }

  const updateFields: string[] = [];
  const values: unknown[] = [];
  const assign = (column: string, value: unknown) => {
    values.push(value);
    updateFields.push(`${column} = $${values.length}`);
  };

  if (input.title !== undefined) assign('title', input.title);
  if (input.content !== undefined) assign('content', input.content);
  if (input.category_id !== undefined) assign('category_id', input.category_id);
  if (input.tags !== undefined) assign('tags', JSON.stringify(input.tags));
  if (input.is_featured !== undefined) assign('is_featured', input.is_featured);

  if (updateFields.length > 0) {
    values.push(tip.id);
    await pool.query(
      `UPDATE tips SET ${updateFields.join(', ')}, updated_at = CURRENT_TIMESTAMP WHERE id = $${values.length}`,
      values
    );
  }

  return findTip(tip.id, viewerId);
};

export const softDeleteTip = async (id: number): Promise<void> => {
  await pool.query('UPDATE tips SET deleted_at = CURRENT_TIMESTAMP WHERE id = $1 AND deleted_at IS NULL', [id]);
};
