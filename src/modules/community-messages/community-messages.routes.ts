import express from 'express';
import * as messagesController from './community-messages.controller';
import repliesRoutes from '../message-replies/message-replies.routes';
import { authenticate, optionalAuthenticate } from '../../middlewares/auth.middleware';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';
import { messageAttachmentsUpload } from '../upload/upload.middleware';

const router = express.Router();

router.get('/', optionalAuthenticate, messagesController.getMessages);
router.get('/poll', optionalAuthenticate, messagesController.pollMessages);
router.get('/latest', optionalAuthenticate, messagesController.getLatestMessages);
router.get('/:id', optionalAuthenticate, messagesController.getMessageById);

router.post('/', authenticate, rateLimiters.posting, messageAttachmentsUpload, messagesController.createMessage);
router.put('/:id', authenticate, messageAttachmentsUpload, messagesController.updateMessage);
router.delete('/:id', authenticate, messagesController.deleteMessage);
router.post('/:id/like', authenticate, messagesController.toggleMessageLike);

router.use('/:messageId/replies', repliesRoutes);

export default router;
