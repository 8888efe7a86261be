import express from 'express';
import * as consultationsController from './consultations.controller';
import { authenticate } from '../../middlewares/auth.middleware';

const router = express.Router();

router.use(authenticate);

router.post('/', consultationsController.createConsultation);
router.get('/my-bookings', consultationsController.getMyBookings);
router.get('/my-expert-bookings', consultationsController.getMyExpertBookings);

router.patch('/:id/accept', consultationsController.acceptConsultation);
router.patch('/:id/decline', consultationsController.declineConsultation);
router.patch('/:id/complete', consultationsController.completeConsultation);
router.patch('/:id/cancel', consultationsController.cancelConsultation);

export default router;
