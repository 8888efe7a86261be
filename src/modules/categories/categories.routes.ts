import express from 'express';
import * as categoriesController from './categories.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

router.get('/', categoriesController.getCategories);

router.post('/', authenticate, requireRole(USER_ROLE.ADMIN), categoriesController.createCategory);
router.put('/:id', authenticate, requireRole(USER_ROLE.ADMIN), categoriesController.updateCategory);
router.delete('/:id', authenticate, requireRole(USER_ROLE.ADMIN), categoriesController.deleteCategory);

export default router;
