import express from 'express';
import * as tipsController from './tips.controller';
import { authenticate, optionalAuthenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

router.get('/', optionalAuthenticate, tipsController.getTips);
router.get('/featured', optionalAuthenticate, tipsController.getFeaturedTips);
router.get('/saved', authenticate, tipsController.getSavedTips);
router.get('/my-tips', authenticate, requireRole(USER_ROLE.EXPERT), tipsController.getMyTips);
router.get('/:id', optionalAuthenticate, tipsController.getTipById);

router.post('/', authenticate, requireRole(USER_ROLE.EXPERT), tipsController.createTip);
router.put('/:id', authenticate, requireRole(USER_ROLE.EXPERT, USER_ROLE.ADMIN), tipsController.updateTip);
router.delete('/:id', authenticate, requireRole(USER_ROLE.EXPERT, USER_ROLE.ADMIN), tipsController.deleteTip);

router.post('/:id/like', authenticate, tipsController.toggleTipLike);
router.post('/:id/save', authenticate, tipsController.toggleTipSave);

export default router;
