import type { PoolClient } from 'pg';
import { pool, withTransaction } from '../../connections';
import type { StoryComment, StoryImage, SuccessStory, SuccessStoryWithRelations } from '../../connections/db/models';
import { HttpError } from '../../utils/errors';
import { likePattern, userSummaryJson } from '../../utils/sql';
import { buildTree } from '../../utils/tree';
import type { TreeNode } from '../../utils/tree';
import type { PageRequest } from '../../utils/validation';
import { publicUrl } from '../upload/localStorage.service';
import type { StoredFile } from '../upload/localStorage.service';
import type { CreateCommentBody, CreateStoryBody, StoryFilters, UpdateStoryBody } from './success-stories.validation';

export type StoryImageView = StoryImage & { image_url: string | null };

export type StoryView = Omit<SuccessStoryWithRelations, 'images'> & { images: StoryImageView[] };

export type StoryCommentNode = TreeNode<StoryComment>;

const storyColumns = (viewer: string) => `
  s.*,
  ${userSummaryJson('u')} AS user,
  COALESCE((
    SELECT json_agg(si ORDER BY si.display_order, si.id)
    FROM story_images si
    WHERE si.success_story_id = s.id
  ), '[]'::json) AS images,
  CASE WHEN ${viewer}::int IS NULL THEN FALSE
       ELSE EXISTS (SELECT 1 FROM story_likes sl WHERE sl.success_story_id = s.id AND sl.user_id = ${viewer}::int)
  END AS is_liked`;

const STORY_FROM = `
  FROM success_stories s
  LEFT JOIN users u ON u.id = s.user_id`;

const ORDER_BY: Record<StoryFilters['sort'], string> = {
  latest: 's.created_at DESC, s.id DESC',
  popular: 's.likes_count DESC, s.created_at DESC, s.id DESC',
  views: 's.views_count DESC, s.created_at DESC, s.id DESC',
};

const COMMENT_SELECT = `
  SELECT c.*, ${userSummaryJson('u')} AS user
  FROM story_comments c
  LEFT JOIN users u ON u.id = c.user_id`;

const toView = (story: SuccessStoryWithRelations): StoryView => ({
  ...story,
  images: story.images.map((image) => ({ ...image, image_url: publicUrl(image.image_path) })),
});

export interface StoryListOptions {
  viewerId: number | null;
  filters?: Partial<StoryFilters>;
  authorId?: number;
  page: PageRequest;
}

export const listStories = async ({
  viewerId,
  filters = {},
  authorId,
  page,
}: StoryListOptions): Promise<{ stories: StoryView[]; total: number }> => {
  const params: unknown[] = [];
  const conditions = ['s.deleted_at IS NULL'];

  if (filters.search) {
    params.push(likePattern(filters.search));
    const p = `$${params.length}`;
    conditions.push(`(s.title ILIKE ${p} OR s.content ILIKE ${p} OR s.crop_type ILIKE ${p})`);
  }
  if (filters.crop_type) {
    params.push(filters.crop_type);
    conditions.push(`s.crop_type = $${params.length}`);
  }
  if (filters.featured) {
    conditions.push('s.is_featured = TRUE');
  }
  if (authorId !== undefined) {
    params.push(authorId);
    conditions.push(`s.user_id = $${params.length}`);
  }

  const where = `WHERE ${conditions.join(' AND ')}`;
  const countResult = await pool.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count ${STORY_FROM} ${where}`,
    params
  );

  const n = params.length;
  const result = await pool.query<SuccessStoryWithRelations>(
    `SELECT ${storyColumns(`$${n + 1}`)} ${STORY_FROM} ${where}
     ORDER BY ${ORDER_BY[filters.sort ?? 'latest']}
     LIMIT $${n + 2} OFFSET $${n + 3}`,
    [...params, viewerId, page.limit, page.offset]
  );

  return { stories: result.rows.map(toView), total: countResult.rows[0].count };
};

export const findStory = async (id: number, viewerId: number | null): Promise<StoryView | null> => {
  const result = await pool.query<SuccessStoryWithRelations>(
    `SELECT ${storyColumns('$2')} ${STORY_FROM} WHERE s.id = $1 AND s.deleted_at IS NULL`,
    [id, viewerId]
  );
  return result.rows[0] ? toView(result.rows[0]) : null;
};

export const findOwnedStory = async (id: number): Promise<SuccessStory | null> => {
  const result = await pool.query<SuccessStory>(
    'SELECT * FROM success_stories WHERE id = $1 AND deleted_at IS NULL',
    [id]
  );
  return result.rows[0] ?? null;
};

const commentTree = (comments: StoryComment[]): StoryCommentNode[] =>
  buildTree(comments, (comment) => ({ id: comment.id, parentId: comment.parent_id }));

/**
 * Counts a view, then returns the story with its full comment tree
 */
export const viewStory = async (
  id: number,
  viewerId: number | null
): Promise<(StoryView & { comments: StoryCommentNode[] }) | null> => {
  const viewed = await pool.query(
    'UPDATE success_stories SET views_count = views_count + 1 WHERE id = $1 AND deleted_at IS NULL RETURNING id',
    [id]
  );
  if (viewed.rows.length === 0) {
    return null;
  }

  const story = await findStory(id, viewerId);
  if (!story) {
    return null;
  }

  const comments = await pool.query<StoryComment>(
    `${COMMENT_SELECT} WHERE c.success_story_id = $1 AND c.deleted_at IS NULL ORDER BY c.created_at ASC, c.id ASC`,
    [id]
  );

  return { ...story, comments: commentTree(comments.rows) };
};

const insertImages = async (
  client: PoolClient,
  storyId: number,
  files: StoredFile[],
  captions: (string | null)[],
  startOrder: number
) => {
  for (const [index, file] of files.entries()) {
    await client.query(
      `INSERT INTO story_images (success_story_id, image_path, caption, display_order)
       VALUES ($1, $2, $3, $4)`,
      [storyId, file.path, captions[index] ?? null, startOrder + index]
    );
  }
};

export const createStory = async (
  userId: number,
  input: CreateStoryBody,
  images: StoredFile[]
): Promise<StoryView | null> => {
  const storyId = await withTransaction(async (client) => {
    const result = await client.query<{ id: number }>(
      `INSERT INTO success_stories (user_id, title, content, location, crop_type, yield_improvement, yield_unit)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING id`,
      [
        userId,
        input.title,
        input.content,
        input.location ?? null,
        input.crop_type ?? null,
        input.yield_improvement ?? null,
        input.yield_unit ?? null,
      ]
    );
    const id = result.rows[0].id;
    await insertImages(client, id, images, input.captions ?? [], 0);
    return id;
  });

  return findStory(storyId, userId);
};

/**
 * Applies the field changes and appends `images` after the existing ones
 */
export const updateStory = async (
  story: SuccessStory,
  viewerId: number,
  input: UpdateStoryBody,
  images: StoredFile[]
): Promise<StoryView | null> => {
  await withTransaction(async (client) => {
    const updateFields: string[] = [];
    const values: unknown[] = [];
    const assign = (column: string, value: unknown) => {
      values.push(value);
      updateFields.push(`${column} = $${values.length}`);
    };

    if (input.title !== undefined) assign('title', input.title);
    if (input.content !== undefined) assign('content', input.content);
    if (input.location !== undefined) assign('location', input.location);
    if (input.crop_type !== undefined) assign('crop_type', input.crop_type);
    if (input.yield_improvement !== undefined) assign('yield_improvement', input.yield_improvement);
    if (input.yield_unit !== undefined) assign('yield_unit', input.yield_unit);

    if (updateFields.length > 0) {
      values.push(story.id);
      await client.query(
        `UPDATE success_stories SET ${updateFields.join(', ')}, updated_at = CURRENT_TIMESTAMP
         WHERE id = $${values.length}`,
        values
      );
    }

    if (images.length > 0) {
      const next = await client.query<{ next_order: number }>(
        'SELECT COALESCE(MAX(display_order) + 1, 0)::int AS next_order FROM story_images WHERE success_story_id = $1',
        [story.id]
      );
      await insertImages(client, story.id, images, input.captions ?? [], next.rows[0].next_order);
    }
  });

  return findStory(story.id, viewerId);
};

/**
 * Soft deletes the story and drops its image rows. Returns the image paths so
 * the caller can remove the files.
 */
export const softDeleteStory = async (id: number): Promise<string[]> =>
  withTransaction(async (client) => {
    await client.query(
      'UPDATE success_stories SET deleted_at = CURRENT_TIMESTAMP WHERE id = $1 AND deleted_at IS NULL',
      [id]
    );
    const removed = await client.query<{ image_path: string }>(
      'DELETE FROM story_images WHERE success_story_id = $1 RETURNING image_path',
      [id]
    );
    return removed.rows.map((row) => row.image_path);
  });

const assertStoryExists = async (storyId: number) => {
  const story = await findOwnedStory(storyId);
  if (!story) {
    throw HttpError.notFound('Success story not found');
  }
};

/**
 * Top-level comments, oldest first, each carrying its replies
 */
export const listComments = async (
  storyId: number,
  page: PageRequest
): Promise<{ comments: StoryCommentNode[]; total: number }> => {
  await assertStoryExists(storyId);

  const countResult = await pool.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count FROM story_comments
     WHERE success_story_id = $1 AND parent_id IS NULL AND deleted_at IS NULL`,
    [storyId]
  );
  const topLevel = await pool.query<StoryComment>(
    `${COMMENT_SELECT}
     WHERE c.success_story_id = $1 AND c.parent_id IS NULL AND c.deleted_at IS NULL
     ORDER BY c.created_at ASC, c.id ASC
     LIMIT $2 OFFSET $3`,
    [storyId, page.limit, page.offset]
  );
  const nested = await pool.query<StoryComment>(
    `${COMMENT_SELECT}
     WHERE c.success_story_id = $1 AND c.parent_id IS NOT NULL AND c.deleted_at IS NULL
     ORDER BY c.created_at ASC, c.id ASC`,
    [storyId]
  );

  // replies under top-level comments of other pages surface as roots; drop them
  const comments = commentTree([...topLevel.rows, ...nested.rows]).filter((node) => node.parent_id === null);
  return { comments, total: countResult.rows[0].count };
};

export const addComment = async (storyId: number, userId: number, input: CreateCommentBody): Promise<StoryComment> => {
  const commentId = await withTransaction(async (client) => {
    const story = await client.query(
      'SELECT id FROM success_stories WHERE id = $1 AND deleted_at IS NULL FOR UPDATE',
      [storyId]
    );
    if (story.rows.length === 0) {
      throw HttpError.notFound('Success story not found');
    }

    if (input.parent_id !== undefined) {
      const parent = await client.query(
        'SELECT id FROM story_comments WHERE id = $1 AND success_story_id = $2 AND deleted_at IS NULL',
        [input.parent_id, storyId]
      );
      if (parent.rows.length === 0) {
        throw HttpError.unprocessable('The selected parent id is invalid.', {
          parent_id: ['The selected parent id is invalid.'],
        });
      }
    }

    const inserted = await client.query<{ id: number }>(
      `INSERT INTO story_comments (success_story_id, user_id, comment, parent_id)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [storyId, userId, input.comment, input.parent_id ?? null]
    );

    await client.query(
      `UPDATE success_stories
       SET comments_count = (
         SELECT COUNT(*) FROM story_comments WHERE success_story_id = $1 AND deleted_at IS NULL
       )
       WHERE id = $1`,
      [storyId]
    );

    return inserted.rows[0].id;
  });

  const result = await pool.query<StoryComment>(`${COMMENT_SELECT} WHERE c.id = $1`, [commentId]);
  return result.rows[0];
};
