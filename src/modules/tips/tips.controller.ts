import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import type { ToggleLikeResponse } from '../../types/response.types';
import { PAGE_SIZE, USER_ROLE } from '../../constants';
import { createTipSchema, tipFiltersSchema, updateTipSchema } from './tips.validation';
import * as tipsService from './tips.service';
import { toggleLike, toggleSave } from '../likes/likes.service';
import { requireAuthUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { HttpError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { parseId, resolvePagination } from '../../utils/validation';

export const getTips = async (req: AuthRequest, res: Response) => {
  try {
    const filters = tipFiltersSchema.parse(req.query);
    const page = resolvePagination(req.query, PAGE_SIZE.TIPS);

    const { tips, total } = await tipsService.listTips({ viewerId: req.user?.id ?? null, filters, page });
    return ResponseHandler.paginated(res, tips, { page: page.page, limit: page.limit, total });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load tips');
  }
};

export const getFeaturedTips = async (req: AuthRequest, res: Response) => {
  try {
    const page = resolvePagination(req.query, PAGE_SIZE.TIPS);
    const { tips, total } = await tipsService.listTips({
      viewerId: req.user?.id ?? null,
      filters: { featured: true },
      page,
    });
    return ResponseHandler.paginated(res, tips, { page: page.page, limit: page.limit, total });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load featured tips');
  }
};

export const getSavedTips = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const page = resolvePagination(req.query, PAGE_SIZE.TIPS);
    const { tips, total } = await tipsService.listTips({ viewerId: user.id, savedBy: user.id, page });
    return ResponseHandler.paginated(res, tips, { page: page.page, limit: page.limit, total });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load saved tips');
  }
};

export const getMyTips = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const page = resolvePagination(req.query, PAGE_SIZE.TIPS);
    const { tips, total } = await tipsService.listTips({ viewerId: user.id, authorId: user.id, page });
    return ResponseHandler.paginated(res, tips, { page: page.page, limit: page.limit, total });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load your tips');
  }
};

export const getTipById = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id);
    const tip = id === null ? null : await tipsService.viewTip(id, req.user?.id ?? null);
    if (!tip) {
      return ResponseHandler.notFound(res, 'Tip not found');
    }
    return ResponseHandler.success(res, { tip });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load tip');
  }
};

export const createTip = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const input = createTipSchema.parse(req.body);

    const tip = await tipsService.createTip(user.id, input);
    logger.info('Tip created', { tipId: tip?.id, userId: user.id });

    return ResponseHandler.created(res, { tip }, 'Tip created successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to create tip');
  }
};

const loadManagedTip = async (req: AuthRequest) => {
  const user = requireAuthUser(req);
  const id = parseId(req.params.id);
  const tip = id === null ? null : await tipsService.findOwnedTip(id);
  if (!tip) {
    throw HttpError.notFound('Tip not found');
  }
  if (tip.user_id !== user.id && user.role !== USER_ROLE.ADMIN) {
    throw HttpError.forbidden('Unauthorized');
  }
  return { user, tip };
};

export const updateTip = async (req: AuthRequest, res: Response) => {
  try {
    const { user, tip } = await loadManagedTip(req);
    const input = updateTipSchema.parse(req.body);

    const updated = await tipsService.updateTip(tip, user.id, input);
    return ResponseHandler.success(res, { tip: updated }, 'Tip updated successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to update tip');
  }
};

export const deleteTip = async (req: AuthRequest, res: Response) => {
  try {
    const { user, tip } = await loadManagedTip(req);
    await tipsService.softDeleteTip(tip.id);

    logger.info('Tip deleted', { tipId: tip.id, userId: user.id });
    return ResponseHandler.success(res, undefined, 'Tip deleted successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to delete tip');
  }
};

export const toggleTipLike = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Tip not found');
    }

    const { liked, likesCount } = await toggleLike('tip', id, user.id);
    const data: ToggleLikeResponse = { is_liked: liked, likes_count: likesCount };
    return ResponseHandler.success(res, data, liked ? 'Tip liked' : 'Tip unliked');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to toggle like');
  }
};

export const toggleTipSave = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Tip not found');
    }

    const { saved } = await toggleSave(id, user.id);
    return ResponseHandler.success(res, { is_saved: saved }, saved ? 'Tip saved' : 'Tip unsaved');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to toggle save');
  }
};
