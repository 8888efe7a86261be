import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import type { ConsultationAction } from '../../constants';
import {
  acceptConsultationSchema,
  createConsultationSchema,
  declineConsultationSchema,
} from './consultations.validation';
import * as consultationsService from './consultations.service';
import { requireAuthUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { logger } from '../../utils/logging';
import { parseId } from '../../utils/validation';

export const getExperts = async (_req: AuthRequest, res: Response) => {
  try {
    const experts = await consultationsService.listExperts();
    return ResponseHandler.success(res, { experts });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load experts');
  }
};

export const createConsultation = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const input = createConsultationSchema.parse(req.body);

    const consultation = await consultationsService.bookConsultation(user.id, input);
    logger.info('Consultation booked', { farmerId: user.id, expertId: input.expert_id });

    return ResponseHandler.created(res, { consultation }, 'Consultation booked successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to book consultation');
  }
};

export const getMyBookings = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const consultations = await consultationsService.listConsultationsFor('farmer', user.id);
    return ResponseHandler.success(res, { consultations });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load consultations');
  }
};

export const getMyExpertBookings = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const consultations = await consultationsService.listConsultationsFor('expert', user.id);
    return ResponseHandler.success(res, { consultations });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load consultations');
  }
};

const SUCCESS_MESSAGES: Record<ConsultationAction, string> = {
  accept: 'Consultation accepted successfully',
  decline: 'Consultation declined successfully',
  complete: 'Consultation marked as completed',
  cancel: 'Consultation cancelled successfully',
};

const handleAction = (action: ConsultationAction) => async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Consultation not found');
    }

    const fields =
      action === 'accept'
        ? acceptConsultationSchema.parse(req.body ?? {})
        : action === 'decline'
          ? declineConsultationSchema.parse(req.body ?? {})
          : {};

    const consultation = await consultationsService.applyAction(user.id, id, action, fields);
    logger.info(`Consultation ${action}`, { consultationId: id, userId: user.id });

    return ResponseHandler.success(res, { consultation }, SUCCESS_MESSAGES[action]);
  } catch (error) {
    return ResponseHandler.fromError(res, error, `Failed to ${action} consultation`);
  }
};

export const acceptConsultation = handleAction('accept');
export const declineConsultation = handleAction('decline');
export const completeConsultation = handleAction('complete');
export const cancelConsultation = handleAction('cancel');
