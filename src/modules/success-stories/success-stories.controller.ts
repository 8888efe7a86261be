import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import type { ToggleLikeResponse } from '../../types/response.types';
import { PAGE_SIZE, USER_ROLE } from '../../constants';
import {
  createCommentSchema,
  createStorySchema,
  storyFiltersSchema,
  updateStorySchema,
} from './success-stories.validation';
import * as storiesService from './success-stories.service';
import { toggleLike } from '../likes/likes.service';
import { requireAuthUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { HttpError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { parseId, resolvePagination } from '../../utils/validation';
import { uploadedFiles } from '../upload/upload.middleware';
import { discardFiles, saveFiles, UPLOAD_FOLDER } from '../upload/localStorage.service';
import type { StoredFile } from '../upload/localStorage.service';

export const getStories = async (req: AuthRequest, res: Response) => {
  try {
    const filters = storyFiltersSchema.parse(req.query);
    const page = resolvePagination(req.query, PAGE_SIZE.STORIES);

    const { stories, total } = await storiesService.listStories({ viewerId: req.user?.id ?? null, filters, page });
    return ResponseHandler.paginated(res, stories, { page: page.page, limit: page.limit, total });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load success stories');
  }
};

export const getMyStories = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const page = resolvePagination(req.query, PAGE_SIZE.STORIES);

    const { stories, total } = await storiesService.listStories({ viewerId: user.id, authorId: user.id, page });
    return ResponseHandler.paginated(res, stories, { page: page.page, limit: page.limit, total });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load your stories');
  }
};

export const getStoryById = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id);
    const story = id === null ? null : await storiesService.viewStory(id, req.user?.id ?? null);
    if (!story) {
      return ResponseHandler.notFound(res, 'Success story not found');
    }
    return ResponseHandler.success(res, { story });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load success story');
  }
};

export const createStory = async (req: AuthRequest, res: Response) => {
  let stored: StoredFile[] = [];
  try {
    const user = requireAuthUser(req);
    const input = createStorySchema.parse(req.body);

    stored = await saveFiles(uploadedFiles(req.files), UPLOAD_FOLDER.STORY_IMAGES);
    const story = await storiesService.createStory(user.id, input, stored);

    logger.info('Success story created', { storyId: story?.id, userId: user.id, images: stored.length });
    return ResponseHandler.created(res, { story }, 'Success story created successfully');
  } catch (error) {
    await discardFiles(stored.map((file) => file.path));
    return ResponseHandler.fromError(res, error, 'Failed to create success story');
  }
};

const loadManagedStory = async (req: AuthRequest) => {
  const user = requireAuthUser(req);
  const id = parseId(req.params.id);
  const story = id === null ? null : await storiesService.findOwnedStory(id);
  if (!story) {
    throw HttpError.notFound('Success story not found');
  }
  if (story.user_id !== user.id && user.role !== USER_ROLE.ADMIN) {
    throw HttpError.forbidden('Unauthorized');
  }
  return { user, story };
};

export const updateStory = async (req: AuthRequest, res: Response) => {
  let stored: StoredFile[] = [];
  try {
    const { user, story } = await loadManagedStory(req);
    const input = updateStorySchema.parse(req.body);

    stored = await saveFiles(uploadedFiles(req.files), UPLOAD_FOLDER.STORY_IMAGES);
    const updated = await storiesService.updateStory(story, user.id, input, stored);

    return ResponseHandler.success(res, { story: updated }, 'Success story updated successfully');
  } catch (error) {
    await discardFiles(stored.map((file) => file.path));
    return ResponseHandler.fromError(res, error, 'Failed to update success story');
  }
};

export const deleteStory = async (req: AuthRequest, res: Response) => {
  try {
    const { user, story } = await loadManagedStory(req);

    const imagePaths = await storiesService.softDeleteStory(story.id);
    await discardFiles(imagePaths);

    logger.info('Success story deleted', { storyId: story.id, userId: user.id });
    return ResponseHandler.success(res, undefined, 'Success story deleted successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to delete success story');
  }
};

export const toggleStoryLike = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Success story not found');
    }

    const { liked, likesCount } = await toggleLike('story', id, user.id);
    const data: ToggleLikeResponse = { is_liked: liked, likes_count: likesCount };
    return ResponseHandler.success(res, data, liked ? 'Story liked' : 'Story unliked');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to toggle like');
  }
};

export const getComments = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Success story not found');
    }

    const page = resolvePagination(req.query, PAGE_SIZE.COMMENTS);
    const { comments, total } = await storiesService.listComments(id, page);
    return ResponseHandler.paginated(res, comments, { page: page.page, limit: page.limit, total });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load comments');
  }
};

export const addComment = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Success story not found');
    }

    const input = createCommentSchema.parse(req.body);
    const comment = await storiesService.addComment(id, user.id, input);

    return ResponseHandler.created(res, { comment }, 'Comment added successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to add comment');
  }
};
