export const CONSULTATION_STATUS = {
  PENDING: 'pending',
  ACCEPTED: 'accepted',
  DECLINED: 'declined',
  COMPLETED: 'completed',
  CANCELLED: 'cancelled',
} as const;

export type ConsultationStatus = typeof CONSULTATION_STATUS[keyof typeof CONSULTATION_STATUS];

export type ConsultationAction = 'accept' | 'decline' | 'complete' | 'cancel';

/**
 * Which side may perform an action, the statuses it applies to and where it leads
 */
export const CONSULTATION_ACTIONS: Record<
  ConsultationAction,
  { actors: readonly ('farmer' | 'expert')[]; from: readonly ConsultationStatus[]; to: ConsultationStatus }
> = {
  accept: { actors: ['expert'], from: [CONSULTATION_STATUS.PENDING], to: CONSULTATION_STATUS.ACCEPTED },
  decline: { actors: ['expert'], from: [CONSULTATION_STATUS.PENDING], to: CONSULTATION_STATUS.DECLINED },
  complete: { actors: ['expert'], from: [CONSULTATION_STATUS.ACCEPTED], to: CONSULTATION_STATUS.COMPLETED },
  cancel: {
    actors: ['farmer', 'expert'],
    from: [CONSULTATION_STATUS.PENDING, CONSULTATION_STATUS.ACCEPTED],
    to: CONSULTATION_STATUS.CANCELLED,
  },
};
