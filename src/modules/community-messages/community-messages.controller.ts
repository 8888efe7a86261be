import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import type { PollingMeta, ToggleLikeResponse } from '../../types/response.types';
import { appConfig } from '../../connections';
import { COMMUNITY_MODERATOR_ROLES, hasRole, PAGE_SIZE } from '../../constants';
import {
  createMessageSchema,
  latestQuerySchema,
  messageFiltersSchema,
  pollQuerySchema,
  updateMessageSchema,
} from './community-messages.validation';
import * as messagesService from './community-messages.service';
import { toggleLike } from '../likes/likes.service';
import { requireAuthUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { HttpError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { parseId, resolvePagination } from '../../utils/validation';
import { uploadedFiles } from '../upload/upload.middleware';
import { discardFiles, saveFiles, UPLOAD_FOLDER } from '../upload/localStorage.service';
import type { StoredFile } from '../upload/localStorage.service';

const noCache = (res: Response) => {
  res.set({
    'Cache-Control': 'no-cache, no-store, must-revalidate',
    Pragma: 'no-cache',
    Expires: '0',
  });
};

const pollingMeta = (): PollingMeta => ({
  server_time: new Date().toISOString(),
  polling_interval: appConfig.pollingIntervalMs,
});

export const getMessages = async (req: AuthRequest, res: Response) => {
  try {
    const filters = messageFiltersSchema.parse(req.query);
    const page = resolvePagination(req.query, PAGE_SIZE.MESSAGES);

    const { messages, total } = await messagesService.listMessages(req.user?.id ?? null, filters, page);

    noCache(res);
    return ResponseHandler.paginated(
      res,
      messages,
      { page: page.page, limit: page.limit, total },
      'Success',
      { ...pollingMeta() }
    );
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load messages');
  }
};

export const pollMessages = async (req: AuthRequest, res: Response) => {
  try {
    const query = pollQuerySchema.parse(req.query);
    const { messages, lastId } = await messagesService.pollMessages(req.user?.id ?? null, query);

    noCache(res);
    return ResponseHandler.success(res, messages, 'Success', 200, {
      last_id: lastId,
      has_new_messages: messages.length > 0,
      ...pollingMeta(),
    });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to poll messages');
  }
};

export const getLatestMessages = async (req: AuthRequest, res: Response) => {
  try {
    const { last_id } = latestQuerySchema.parse(req.query);
    const { messages, lastId } = await messagesService.latestMessages(req.user?.id ?? null, last_id);

    noCache(res);
    return ResponseHandler.success(res, messages, 'Success', 200, { last_id: lastId });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load latest messages');
  }
};

export const getMessageById = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id);
    const message = id === null ? null : await messagesService.viewMessage(id, req.user?.id ?? null);
    if (!message) {
      return ResponseHandler.notFound(res, 'Message not found');
    }
    return ResponseHandler.success(res, message);
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load message');
  }
};

export const createMessage = async (req: AuthRequest, res: Response) => {
  let stored: StoredFile[] = [];
  try {
    const user = requireAuthUser(req);
    const input = createMessageSchema.parse(req.body);

    stored = await saveFiles(uploadedFiles(req.files), UPLOAD_FOLDER.COMMUNITY_FILES);
    const message = await messagesService.createMessage(user.id, input, stored);

    logger.info('Community message created', { messageId: message?.id, userId: user.id, attachments: stored.length });
    return ResponseHandler.created(res, message, 'Message created successfully');
  } catch (error) {
    await discardFiles(stored.map((file) => file.path));
    return ResponseHandler.fromError(res, error, 'Failed to create message');
  }
};

const loadManagedMessage = async (req: AuthRequest, action: 'edit' | 'delete') => {
  const user = requireAuthUser(req);
  const id = parseId(req.params.id);
  const message = id === null ? null : await messagesService.findOwnedMessage(id);
  if (!message) {
    throw HttpError.notFound('Message not found');
  }
  if (message.user_id !== user.id && !hasRole(user.role, COMMUNITY_MODERATOR_ROLES)) {
    throw HttpError.forbidden(`You are not authorized to ${action} this message`);
  }
  return { user, message };
};

export const updateMessage = async (req: AuthRequest, res: Response) => {
  let stored: StoredFile[] = [];
  try {
    const { user, message } = await loadManagedMessage(req, 'edit');
    const input = updateMessageSchema.parse(req.body);

    stored = await saveFiles(uploadedFiles(req.files), UPLOAD_FOLDER.COMMUNITY_FILES);
    const updated = await messagesService.updateMessage(message, user.id, input, stored);

    return ResponseHandler.success(res, updated, 'Message updated successfully');
  } catch (error) {
    await discardFiles(stored.map((file) => file.path));
    return ResponseHandler.fromError(res, error, 'Failed to update message');
  }
};

export const deleteMessage = async (req: AuthRequest, res: Response) => {
  try {
    const { user, message } = await loadManagedMessage(req, 'delete');

    const filePaths = await messagesService.softDeleteMessage(message.id);
    await discardFiles(filePaths);

    logger.info('Community message deleted', { messageId: message.id, userId: user.id });
    return ResponseHandler.success(res, undefined, 'Message deleted successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to delete message');
  }
};

export const toggleMessageLike = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Message not found');
    }

    const { liked, likesCount } = await toggleLike('message', id, user.id);
    const data: ToggleLikeResponse = { is_liked: liked, likes_count: likesCount };
    return ResponseHandler.success(res, data, liked ? 'Message liked' : 'Message unliked');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to toggle like');
  }
};
