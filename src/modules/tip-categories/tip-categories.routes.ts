import express from 'express';
import * as tipCategoriesController from './tip-categories.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

router.get('/', tipCategoriesController.getTipCategories);

router.post('/', authenticate, requireRole(USER_ROLE.ADMIN), tipCategoriesController.createTipCategory);
router.put('/:id', authenticate, requireRole(USER_ROLE.ADMIN), tipCategoriesController.updateTipCategory);
router.delete('/:id', authenticate, requireRole(USER_ROLE.ADMIN), tipCategoriesController.deleteTipCategory);

export default router;
