import express from 'express';
import * as authController from './auth.controller';
import { authenticate } from '../../middlewares/auth.middleware';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';
import { userImageUpload } from '../upload/upload.middleware';

const router = express.Router();

router.post('/register', rateLimiters.auth, authController.register);
router.post('/login', rateLimiters.auth, authController.login);

router.patch('/user', authenticate, authController.updateDetails);
router.post('/user/image', authenticate, userImageUpload, authController.updateImage);
router.get('/user/profile', authenticate, authController.getProfile);
router.post('/logout', authenticate, authController.logout);

router.post('/password/request-reset', rateLimiters.passwordReset, authController.requestPasswordReset);
router.post('/password/reset', rateLimiters.passwordReset, authController.resetPassword);

export default router;
