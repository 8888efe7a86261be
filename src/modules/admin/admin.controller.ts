import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { statsQuerySchema } from './admin.validation';
import { getPlatformStats } from './admin.service';
import { ResponseHandler } from '../../utils/response';

export const getStatistics = async (req: AuthRequest, res: Response) => {
  try {
    const query = statsQuerySchema.parse(req.query);
    const stats = await getPlatformStats(query);

    return ResponseHandler.success(res, stats, 'Statistics retrieved successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load statistics');
  }
};
