import type { PoolClient } from 'pg';
import { pool, withTransaction } from '../../connections';
import type {
  CommunityMessage,
  CommunityMessageWithRelations,
  MessageAttachment,
} from '../../connections/db/models';
import { attachmentTypeFromMime, LATEST_LIMIT, POLL_LIMIT } from '../../constants';
import { likePattern, userSummaryJson } from '../../utils/sql';
import type { PageRequest } from '../../utils/validation';
import { publicUrl } from '../upload/localStorage.service';
import type { StoredFile } from '../upload/localStorage.service';
import { loadReplyTree } from '../message-replies/message-replies.service';
import type { ReplyNode } from '../message-replies/message-replies.service';
import type { CreateMessageBody, MessageFilters, PollQuery, UpdateMessageBody } from './community-messages.validation';

export type AttachmentView = MessageAttachment & { file_url: string | null };

export type MessageView = Omit<CommunityMessageWithRelations, 'attachments'> & { attachments: AttachmentView[] };

const messageColumns = (viewer: string) => `
  m.*,
  ${userSummaryJson('u')} AS user,
  COALESCE((
    SELECT json_agg(ma ORDER BY ma.display_order, ma.id)
    FROM message_attachments ma
    WHERE ma.community_message_id = m.id
  ), '[]'::json) AS attachments,
  CASE WHEN ${viewer}::int IS NULL THEN FALSE
       ELSE EXISTS (SELECT 1 FROM message_likes ml WHERE ml.community_message_id = m.id AND ml.user_id = ${viewer}::int)
  END AS is_liked`;

const MESSAGE_FROM = `
  FROM community_messages m
  LEFT JOIN users u ON u.id = m.user_id`;

const FEED_ORDER = 'm.is_pinned DESC, m.created_at DESC, m.id DESC';

const toView = (message: CommunityMessageWithRelations): MessageView => ({
  ...message,
  attachments: message.attachments.map((attachment) => ({
    ...attachment,
    file_url: publicUrl(attachment.file_path),
  })),
});

const selectMessages = async (
  conditions: string[],
  params: unknown[],
  viewerId: number | null,
  orderBy: string,
  limit: number,
  offset: number = 0
): Promise<MessageView[]> => {
  const n = params.length;
  const result = await pool.query<CommunityMessageWithRelations>(
    `SELECT ${messageColumns(`$${n + 1}`)} ${MESSAGE_FROM}
     WHERE ${conditions.join(' AND ')}
     ORDER BY ${orderBy}
     LIMIT $${n + 2} OFFSET $${n + 3}`,
    [...params, viewerId, limit, offset]
  );
  return result.rows.map(toView);
};

export const listMessages = async (
  viewerId: number | null,
  filters: MessageFilters,
  page: PageRequest
): Promise<{ messages: MessageView[]; total: number }> => {
  const params: unknown[] = [];
  const conditions = ['m.deleted_at IS NULL'];

  if (filters.category) {
    params.push(filters.category);
    conditions.push(`m.category = $${params.length}`);
  }
  if (filters.search) {
    params.push(likePattern(filters.search));
    const p = `$${params.length}`;
    conditions.push(`(m.title ILIKE ${p} OR m.content ILIKE ${p} OR m.tags::text ILIKE ${p})`);
  }
  if (filters.pinned) {
    conditions.push('m.is_pinned = TRUE');
  }
  if (filters.announcement) {
    conditions.push('m.is_announcement = TRUE');
  }
  if (filters.last_updated) {
    params.push(filters.last_updated);
    conditions.push(`m.updated_at > $${params.length}`);
  }

  const countResult = await pool.query<{ count: number }>(
    `SELECT COUNT(*)::int AS count FROM community_messages m WHERE ${conditions.join(' AND ')}`,
    params
  );
  const messages = await selectMessages(conditions, params, viewerId, FEED_ORDER, page.limit, page.offset);

  return { messages, total: countResult.rows[0].count };
};

/**
 * Messages past the client's cursor. `lastId` is echoed back when nothing new arrived.
 */
export const pollMessages = async (
  viewerId: number | null,
  query: PollQuery
): Promise<{ messages: MessageView[]; lastId: number }> => {
  const params: unknown[] = [];
  const conditions = ['m.deleted_at IS NULL'];

  if (query.last_id > 0) {
    params.push(query.last_id);
    conditions.push(`m.id > $${params.length}`);
  }
  if (query.last_updated) {
    params.push(query.last_updated);
    conditions.push(`m.updated_at > $${params.length}`);
  }

  const messages = await selectMessages(conditions, params, viewerId, FEED_ORDER, POLL_LIMIT);
  return { messages, lastId: maxId(messages, query.last_id) };
};

export const latestMessages = async (
  viewerId: number | null,
  lastId: number
): Promise<{ messages: MessageView[]; lastId: number }> => {
  const messages = await selectMessages(
    ['m.deleted_at IS NULL', 'm.id > $1'],
    [lastId],
    viewerId,
    'm.created_at DESC, m.id DESC',
    LATEST_LIMIT
  );
  return { messages, lastId: maxId(messages, lastId) };
};

export const maxId = (rows: { id: number }[], fallback: number): number =>
  rows.reduce((max, row) => Math.max(max, row.id), fallback);

export const findMessage = async (id: number, viewerId: number | null): Promise<MessageView | null> => {
  const result = await pool.query<CommunityMessageWithRelations>(
    `SELECT ${messageColumns('$2')} ${MESSAGE_FROM} WHERE m.id = $1 AND m.deleted_at IS NULL`,
    [id, viewerId]
  );
  return result.rows[0] ? toView(result.rows[0]) : null;
};

export const findOwnedMessage = async (id: number): Promise<CommunityMessage | null> => {
  const result = await pool.query<CommunityMessage>(
    'SELECT * FROM community_messages WHERE id = $1 AND deleted_at IS NULL',
    [id]
  );
  return result.rows[0] ?? null;
};

/**
 * Counts a view and returns the message with its reply tree
 */
export const viewMessage = async (
  id: number,
  viewerId: number | null
): Promise<(MessageView & { replies: ReplyNode[] }) | null> => {
  const viewed = await pool.query(
    'UPDATE community_messages SET views_count = views_count + 1 WHERE id = $1 AND deleted_at IS NULL RETURNING id',
    [id]
  );
  if (viewed.rows.length === 0) {
    return null;
  }

  const message = await findMessage(id, viewerId);
  if (!message) {
    return null;
  }

  return { ...message, replies: await loadReplyTree(id, viewerId) };
};

const insertAttachments = async (client: PoolClient, messageId: number, files: StoredFile[]) => {
  if (files.length === 0) {
    return;
  }

  const next = await client.query<{ next_order: number }>(
    'SELECT COALESCE(MAX(display_order) + 1, 0)::int AS next_order FROM message_attachments WHERE community_message_id = $1',
    [messageId]
  );
  const start = next.rows[0].next_order;

  for (const [index, file] of files.entries()) {
    await client.query(
      `INSERT INTO message_attachments
         (community_message_id, file_name, file_path, file_type, mime_type, file_size, display_order)
       VALUES ($1, $2, $3, $4, $5, $6, $7)`,
      [
        messageId,
        file.originalName,
        file.path,
        attachmentTypeFromMime(file.mimeType),
        file.mimeType,
        file.size,
        start + index,
      ]
    );
  }
};

export const createMessage = async (
  userId: number,
  input: CreateMessageBody,
  attachments: StoredFile[]
): Promise<MessageView | null> => {
  const messageId = await withTransaction(async (client) => {
    const result = await client.query<{ id: number }>(
      `INSERT INTO community_messages (user_id, title, content, category, tags, is_pinned, is_announcement)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING id`,
      [
        userId,
        input.title ?? null,
        input.content,
        input.category ?? null,
        JSON.stringify(input.tags ?? []),
        input.is_pinned ?? false,
        input.is_announcement ?? false,
      ]
    );
    const id = result.rows[0].id;
    await insertAttachments(client, id, attachments);
    return id;
  });

  return findMessage(messageId, userId);
};

/**
 * Fields left out keep their value; new attachments are appended
 */
export const updateMessage = async (
  message: CommunityMessage,
  viewerId: number,
  input: UpdateMessageBody,
  attachments: StoredFile[]
): Promise<MessageView | null> => {
  await withTransaction(async (client) => {
    const updateFields: string[] = [];
    const values: unknown[] = [];
    const assign = (column: string, value: unknown) => {
      values.push(value);
      updateFields.push(`${column} = $${values.length}`);
    };

    if (input.title !== undefined) assign('title', input.title);
    if (input.content !== undefined) assign('content', input.content);
    if (input.category !== undefined) assign('category', input.category);
    if (input.tags !== undefined) assign('tags', JSON.stringify(input.tags));
    if (input.is_pinned !== undefined) assign('is_pinned', input.is_pinned);
    if (input.is_announcement !== undefined) assign('is_announcement', input.is_announcement);

    // updated_at always moves so pollers using last_updated see the change
    values.push(message.id);
    await client.query(
      `UPDATE community_messages
       SET ${[...updateFields, 'updated_at = CURRENT_TIMESTAMP'].join(', ')}
       WHERE id = $${values.length}`,
      values
    );

    await insertAttachments(client, message.id, attachments);
  });

  return findMessage(message.id, viewerId);
};

/**
 * Soft deletes the message and drops its attachment rows. Returns the file paths to remove.
 */
export const softDeleteMessage = async (id: number): Promise<string[]> =>
  withTransaction(async (client) => {
    await client.query(
      `UPDATE community_messages
       SET deleted_at = CURRENT_TIMESTAMP, updated_at = CURRENT_TIMESTAMP
       WHERE id = $1 AND deleted_at IS NULL`,
      [id]
    );
    const removed = await client.query<{ file_path: string }>(
      'DELETE FROM message_attachments WHERE community_message_id = $1 RETURNING file_path',
      [id]
    );
    return removed.rows.map((row) => row.file_path);
  });
