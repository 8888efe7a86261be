import express from 'express';
import * as repliesController from './message-replies.controller';
import { authenticate, optionalAuthenticate } from '../../middlewares/auth.middleware';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';

// Mounted under /community/messages/:messageId/replies
const router = express.Router({ mergeParams: true });

router.get('/', optionalAuthenticate, repliesController.getReplies);
router.post('/', authenticate, rateLimiters.posting, repliesController.createReply);
router.put('/:replyId', authenticate, repliesController.updateReply);
router.delete('/:replyId', authenticate, repliesController.deleteReply);
router.post('/:replyId/like', authenticate, repliesController.toggleReplyLike);

export default router;
