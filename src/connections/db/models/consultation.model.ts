import type { ConsultationStatus } from '../../../constants';
import type { UserSummary } from './user.model';

export interface Consultation {
  id: number;
  farmer_id: number;
  expert_id: number;
  consultation_date: Date;
  description: string | null;
  status: ConsultationStatus;
  expert_notes: string | null;
  decline_reason: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface ConsultationWithUsers extends Consultation {
  farmer?: UserSummary | null;
  expert?: UserSummary | null;
}
