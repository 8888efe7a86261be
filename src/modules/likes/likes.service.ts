import { withTransaction } from '../../connections';
import { HttpError } from '../../utils/errors';

/**
 * Tables behind each likeable resource. Identifiers are fixed here and never
 * come from the request.
 */
export const LIKE_TARGETS = {
  tip: { table: 'tips', likeTable: 'tip_likes', foreignKey: 'tip_id', softDelete: true, label: 'Tip' },
  story: {
    table: 'success_stories',
    likeTable: 'story_likes',
    foreignKey: 'success_story_id',
    softDelete: true,
    label: 'Success story',
  },
  message: {
    table: 'community_messages',
    likeTable: 'message_likes',
    foreignKey: 'community_message_id',
    softDelete: true,
    label: 'Message',
  },
  reply: {
    table: 'message_replies',
    likeTable: 'reply_likes',
    foreignKey: 'message_reply_id',
    softDelete: true,
    label: 'Reply',
  },
} as const;

export type LikeTarget = keyof typeof LIKE_TARGETS;

export interface ToggleResult {
  liked: boolean;
  likesCount: number;
}

/**
 * Adds the caller's like or removes it, keeping likes_count in step.
 * `scope` narrows the target lookup, e.g. a reply must belong to its message.
 */
export const toggleLike = async (
  target: LikeTarget,
  targetId: number,
  userId: number,
  scope?: { column: 'community_message_id'; value: number }
): Promise<ToggleResult> => {
  const { table, likeTable, foreignKey, softDelete, label } = LIKE_TARGETS[target];

  return withTransaction(async (client) => {
    const conditions = ['id = $1'];
    const params: unknown[] = [targetId];
    if (softDelete) {
      conditions.push('deleted_at IS NULL');
    }
    if (scope) {
      params.push(scope.value);
      conditions.push(`${scope.column} = $${params.length}`);
    }

    const locked = await client.query(`SELECT id FROM ${table} WHERE ${conditions.join(' AND ')} FOR UPDATE`, params);
    if (locked.rows.length === 0) {
      throw HttpError.notFound(`${label} not found`);
    }

    const removed = await client.query(
      `DELETE FROM ${likeTable} WHERE ${foreignKey} = $1 AND user_id = $2 RETURNING id`,
      [targetId, userId]
    );

    let liked: boolean;
    let delta: number;
    if (removed.rows.length > 0) {
      liked = false;
      delta = -1;
    } else {
      const inserted = await client.query(
        `INSERT INTO ${likeTable} (${foreignKey}, user_id) VALUES ($1, $2)
         ON CONFLICT DO NOTHING
         RETURNING id`,
        [targetId, userId]
      );
      liked = true;
      delta = inserted.rows.length > 0 ? 1 : 0;
    }

    const updated = await client.query<{ likes_count: number }>(
      `UPDATE ${table} SET likes_count = GREATEST(likes_count + $1, 0) WHERE id = $2 RETURNING likes_count`,
      [delta, targetId]
    );

    return { liked, likesCount: updated.rows[0].likes_count };
  });
};

/**
 * Save / unsave a tip. No counter is kept for saves.
 */
export const toggleSave = async (tipId: number, userId: number): Promise<{ saved: boolean }> =>
  withTransaction(async (client) => {
    const tip = await client.query('SELECT id FROM tips WHERE id = $1 AND deleted_at IS NULL FOR UPDATE', [tipId]);
    if (tip.rows.length === 0) {
      throw HttpError.notFound('Tip not found');
    }

    const removed = await client.query('DELETE FROM saved_tips WHERE tip_id = $1 AND user_id = $2 RETURNING id', [
      tipId,
      userId,
    ]);
    if (removed.rows.length > 0) {
      return { saved: false };
    }

    await client.query('INSERT INTO saved_tips (tip_id, user_id) VALUES ($1, $2) ON CONFLICT DO NOTHING', [
      tipId,
      userId,
    ]);
    return { saved: true };
  });
