import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import type { ToggleLikeResponse } from '../../types/response.types';
import { COMMUNITY_MODERATOR_ROLES, hasRole, PAGE_SIZE } from '../../constants';
import { createReplySchema, updateReplySchema } from './message-replies.validation';
import * as repliesService from './message-replies.service';
import { toggleLike } from '../likes/likes.service';
import { requireAuthUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { HttpError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { parseId, resolvePagination } from '../../utils/validation';

const messageIdFrom = (req: AuthRequest): number => {
  const messageId = parseId(req.params.messageId);
  if (messageId === null) {
    throw HttpError.notFound('Message not found');
  }
  return messageId;
};

const replyIdFrom = (req: AuthRequest): number => {
  const replyId = parseId(req.params.replyId);
  if (replyId === null) {
    throw HttpError.notFound('Reply not found');
  }
  return replyId;
};

export const getReplies = async (req: AuthRequest, res: Response) => {
  try {
    const messageId = messageIdFrom(req);
    const page = resolvePagination(req.query, PAGE_SIZE.REPLIES);

    const { replies, total } = await repliesService.listReplies(messageId, req.user?.id ?? null, page);
    return ResponseHandler.paginated(res, replies, { page: page.page, limit: page.limit, total });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load replies');
  }
};

export const createReply = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const messageId = messageIdFrom(req);
    const input = createReplySchema.parse(req.body);

    const reply = await repliesService.createReply(messageId, user.id, input);
    return ResponseHandler.created(res, reply, 'Reply added successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to add reply');
  }
};

const loadManagedReply = async (req: AuthRequest, action: 'edit' | 'delete') => {
  const user = requireAuthUser(req);
  const reply = await repliesService.findReply(messageIdFrom(req), replyIdFrom(req), user.id);
  if (!reply) {
    throw HttpError.notFound('Reply not found');
  }
  if (reply.user_id !== user.id && !hasRole(user.role, COMMUNITY_MODERATOR_ROLES)) {
    throw HttpError.forbidden(`You are not authorized to ${action} this reply`);
  }
  return { user, reply };
};

export const updateReply = async (req: AuthRequest, res: Response) => {
  try {
    const { user, reply } = await loadManagedReply(req, 'edit');
    const { content } = updateReplySchema.parse(req.body);

    const updated = await repliesService.updateReply(reply, user.id, content);
    return ResponseHandler.success(res, updated, 'Reply updated successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to update reply');
  }
};

export const deleteReply = async (req: AuthRequest, res: Response) => {
  try {
    const { user, reply } = await loadManagedReply(req, 'delete');

    const removed = await repliesService.deleteReply(reply);
    logger.info('Reply deleted', { replyId: reply.id, userId: user.id, removed: removed.length });

    return ResponseHandler.success(res, undefined, 'Reply deleted successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to delete reply');
  }
};

export const toggleReplyLike = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const messageId = messageIdFrom(req);
    const replyId = replyIdFrom(req);

    const { liked, likesCount } = await toggleLike('reply', replyId, user.id, {
      column: 'community_message_id',
      value: messageId,
    });
    const data: ToggleLikeResponse = { is_liked: liked, likes_count: likesCount };
    return ResponseHandler.success(res, data, liked ? 'Reply liked' : 'Reply unliked');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to toggle like');
  }
};
