import express from 'express';
import * as adminController from './admin.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

// All admin routes require admin role
router.use(authenticate);
router.use(requireRole(USER_ROLE.ADMIN));

router.get('/stats', adminController.getStatistics);

export default router;
