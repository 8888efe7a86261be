import type { PoolClient } from 'pg';
import { pool, withTransaction } from '../../connections';
import type { MessageReply } from '../../connections/db/models';
import { HttpError } from '../../utils/errors';
import { userSummaryJson } from '../../utils/sql';
import { buildTree, collectDescendantIds } from '../../utils/tree';
import type { TreeNode } from '../../utils/tree';
import type { PageRequest } from '../../utils/validation';
import type { CreateReplyBody } from './message-replies.validation';

export type ReplyNode = TreeNode<MessageReply>;

const replySelect = (viewer: string) => `
  SELECT r.*,
         ${userSummaryJson('u')} AS user,
         CASE WHEN ${viewer}::int IS NULL THEN FALSE
              ELSE EXISTS (SELECT 1 FROM reply_likes rl WHERE rl.message_reply_id = r.id AND rl.user_id = ${viewer}::int)
         END AS is_liked
  FROM message_replies r
  LEFT JOIN users u ON u.id = r.user_id`;

const replyTree = (replies: MessageReply[]): ReplyNode[] =>
  buildTree(replies, (reply) => ({ id: reply.id, parentId: reply.parent_reply_id }));

export const assertMessageExists = async (messageId: number): Promise<void> => {
  const result = await pool.query('SELECT 1 FROM community_messages WHERE id = $1 AND deleted_at IS NULL', [
    messageId,
  ]);
  if (result.rows.length === 0) {
    throw HttpError.notFound('Message not found');
  }
};

/**
 * Every live reply of a message nested under its parent, oldest first
 */
export const loadReplyTree = async (messageId: number, viewerId: number | null): Promise<ReplyNode[]> => {
  const result = await pool.query<MessageReply>(
    `${replySelect('$2')}
     WHERE r.community_message_id = $1 AND r.deleted_at IS NULL
     ORDER BY r.created_at ASC, r.id ASC`,
    [messageId, viewerId]
  );
  return replyTree(result.rows);
};

export const listReplies = async (
  messageId: number,
  viewerId: number | null,
  page: PageRequest
): Promise<{ replies: ReplyNode[]; total: number }> => {
  await assertMessageExists(messageId);

  const countResult = await pool.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count FROM message_replies
     WHERE community_message_id = $1 AND parent_reply_id IS NULL AND deleted_at IS NULL`,
    [messageId]
  );
  const topLevel = await pool.query<MessageReply>(
    `${replySelect('$2')}
     WHERE r.community_message_id = $1 AND r.parent_reply_id IS NULL AND r.deleted_at IS NULL
     ORDER BY r.created_at ASC, r.id ASC
     LIMIT $3 OFFSET $4`,
    [messageId, viewerId, page.limit, page.offset]
  );
  const nested = await pool.query<MessageReply>(
    `${replySelect('$2')}
     WHERE r.community_message_id = $1 AND r.parent_reply_id IS NOT NULL AND r.deleted_at IS NULL
     ORDER BY r.created_at ASC, r.id ASC`,
    [messageId, viewerId]
  );

  const replies = replyTree([...topLevel.rows, ...nested.rows]).filter((node) => node.parent_reply_id === null);
  return { replies, total: countResult.rows[0].count };
};

export const findReply = async (
  messageId: number,
  replyId: number,
  viewerId: number | null
): Promise<MessageReply | null> => {
  const result = await pool.query<MessageReply>(
    `${replySelect('$3')} WHERE r.id = $1 AND r.community_message_id = $2 AND r.deleted_at IS NULL`,
    [replyId, messageId, viewerId]
  );
  return result.rows[0] ?? null;
};

/**
 * replies_count and last_reply_at recomputed from the live replies
 */
export const refreshReplyCounters = async (client: PoolClient, messageId: number): Promise<void> => {
  await client.query(
    `UPDATE community_messages m
     SET replies_count = stats.total,
         last_reply_at = stats.last_at
     FROM (
       SELECT COUNT(*)::int AS total, MAX(created_at) AS last_at
       FROM message_replies
       WHERE community_message_id = $1 AND deleted_at IS NULL
     ) stats
     WHERE m.id = $1`,
    [messageId]
  );
};

const lockMessage = async (client: PoolClient, messageId: number) => {
  const locked = await client.query(
    'SELECT id FROM community_messages WHERE id = $1 AND deleted_at IS NULL FOR UPDATE',
    [messageId]
  );
  if (locked.rows.length === 0) {
    throw HttpError.notFound('Message not found');
  }
};

export const createReply = async (
  messageId: number,
  userId: number,
  input: CreateReplyBody
): Promise<MessageReply | null> => {
  const replyId = await withTransaction(async (client) => {
    await lockMessage(client, messageId);

    if (input.parent_reply_id !== undefined) {
      const parent = await client.query<{ community_message_id: number }>(
        'SELECT community_message_id FROM message_replies WHERE id = $1 AND deleted_at IS NULL',
        [input.parent_reply_id]
      );
      if (parent.rows.length === 0) {
        throw HttpError.unprocessable('The selected parent reply id is invalid.', {
          parent_reply_id: ['The selected parent reply id is invalid.'],
        });
      }
      if (parent.rows[0].community_message_id !== messageId) {
        throw HttpError.unprocessable('Parent reply does not belong to this message', {
          parent_reply_id: ['Parent reply does not belong to this message'],
        });
      }
    }

    const inserted = await client.query<{ id: number }>(
      `INSERT INTO message_replies (community_message_id, user_id, content, parent_reply_id)
       VALUES ($1, $2, $3, $4)
       RETURNING id`,
      [messageId, userId, input.content, input.parent_reply_id ?? null]
    );

    await refreshReplyCounters(client, messageId);
    return inserted.rows[0].id;
  });

  return findReply(messageId, replyId, userId);
};

export const updateReply = async (reply: MessageReply, viewerId: number, content: string): Promise<MessageReply | null> => {
  await pool.query('UPDATE message_replies SET content = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2', [
    content,
    reply.id,
  ]);
  return findReply(reply.community_message_id, reply.id, viewerId);
};

/**
 * Soft deletes the reply together with everything below it. Returns the ids removed.
 */
export const deleteReply = async (reply: MessageReply): Promise<number[]> =>
  withTransaction(async (client) => {
    await lockMessage(client, reply.community_message_id);

    const rows = await client.query<{ id: number; parent_reply_id: number | null }>(
      'SELECT id, parent_reply_id FROM message_replies WHERE community_message_id = $1 AND deleted_at IS NULL',
      [reply.community_message_id]
    );
    const ids = [
      reply.id,
      ...collectDescendantIds(
        reply.id,
        rows.rows.map((row) => ({ id: row.id, parentId: row.parent_reply_id }))
      ),
    ];

    await client.query(
      'UPDATE message_replies SET deleted_at = CURRENT_TIMESTAMP WHERE id = ANY($1::int[]) AND deleted_at IS NULL',
      [ids]
    );
    await refreshReplyCounters(client, reply.community_message_id);

    return ids;
  });
