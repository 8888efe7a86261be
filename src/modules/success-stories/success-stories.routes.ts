import express from 'express';
import * as storiesController from './success-stories.controller';
import { authenticate, optionalAuthenticate } from '../../middlewares/auth.middleware';
import { rateLimiters } from '../../middlewares/rateLimit.middleware';
import { storyImagesUpload } from '../upload/upload.middleware';

const router = express.Router();

router.get('/', optionalAuthenticate, storiesController.getStories);
router.get('/my-stories', authenticate, storiesController.getMyStories);
router.get('/:id', optionalAuthenticate, storiesController.getStoryById);

router.post('/', authenticate, storyImagesUpload, storiesController.createStory);
router.put('/:id', authenticate, storyImagesUpload, storiesController.updateStory);
router.delete('/:id', authenticate, storiesController.deleteStory);

router.post('/:id/like', authenticate, storiesController.toggleStoryLike);
router.get('/:id/comments', storiesController.getComments);
router.post('/:id/comments', authenticate, rateLimiters.posting, storiesController.addComment);

export default router;
