import { pool, withTransaction } from '../../connections';
import type { Consultation, ConsultationWithUsers, PublicUser } from '../../connections/db/models';
import { CONSULTATION_ACTIONS, CONSULTATION_STATUS, USER_ROLE } from '../../constants';
import type { ConsultationAction } from '../../constants';
import { HttpError } from '../../utils/errors';
import { PUBLIC_USER_COLUMNS, userSummaryJson } from '../../utils/sql';

const CONSULTATION_SELECT = `
  SELECT c.*,
         ${userSummaryJson('f')} AS farmer,
         ${userSummaryJson('e')} AS expert
  FROM consultations c
  LEFT JOIN users f ON f.id = c.farmer_id
  LEFT JOIN users e ON e.id = c.expert_id`;

const STATUS_ERRORS: Record<ConsultationAction, string> = {
  accept: 'Consultation is not in pending status',
  decline: 'Consultation is not in pending status',
  complete: 'Consultation must be accepted before completing',
  cancel: 'Consultation cannot be cancelled in its current status',
};

/**
 * Throws 403 when the caller is not a party allowed to act, 422 when the
 * consultation is not in a status the action applies to.
 */
export const assertActionAllowed = (
  consultation: Pick<Consultation, 'farmer_id' | 'expert_id' | 'status'>,
  actorId: number,
  action: ConsultationAction
) => {
  const rule = CONSULTATION_ACTIONS[action];
  const isParty =
    (rule.actors.includes('farmer') && consultation.farmer_id === actorId) ||
    (rule.actors.includes('expert') && consultation.expert_id === actorId);

  if (!isParty) {
    throw HttpError.forbidden('Unauthorized');
  }

  if (!rule.from.includes(consultation.status)) {
    throw HttpError.unprocessable(STATUS_ERRORS[action], { status: [STATUS_ERRORS[action]] });
  }
};

export const listExperts = async (): Promise<PublicUser[]> => {
  const result = await pool.query<PublicUser>(
    `SELECT ${PUBLIC_USER_COLUMNS} FROM users WHERE role = $1 ORDER BY name ASC`,
    [USER_ROLE.EXPERT]
  );
  return result.rows;
};

export const findConsultation = async (id: number): Promise<ConsultationWithUsers | null> => {
  const result = await pool.query<ConsultationWithUsers>(`${CONSULTATION_SELECT} WHERE c.id = $1`, [id]);
  return result.rows[0] ?? null;
};

export const listConsultationsFor = async (
  side: 'farmer' | 'expert',
  userId: number
): Promise<ConsultationWithUsers[]> => {
  const column = side === 'farmer' ? 'c.farmer_id' : 'c.expert_id';
  const result = await pool.query<ConsultationWithUsers>(
    `${CONSULTATION_SELECT} WHERE ${column} = $1 ORDER BY c.created_at DESC, c.id DESC`,
    [userId]
  );
  return result.rows;
};

export const bookConsultation = async (
  farmerId: number,
  input: { expert_id: number; consultation_date: Date; description: string }
): Promise<ConsultationWithUsers | null> => {
  const expert = await pool.query('SELECT 1 FROM users WHERE id = $1 AND role = $2', [
    input.expert_id,
    USER_ROLE.EXPERT,
  ]);
  if (expert.rows.length === 0) {
    throw HttpError.unprocessable('The selected expert id is invalid.', {
      expert_id: ['The selected expert id is invalid.'],
    });
  }

  const result = await pool.query<{ id: number }>(
    `INSERT INTO consultations (farmer_id, expert_id, consultation_date, description, status)
     VALUES ($1, $2, $3, $4, $5)
     RETURNING id`,
    [farmerId, input.expert_id, input.consultation_date, input.description, CONSULTATION_STATUS.PENDING]
  );

  return findConsultation(result.rows[0].id);
};

/**
 * Runs one state-machine action under a row lock
 */
export const applyAction = async (
  actorId: number,
  consultationId: number,
  action: ConsultationAction,
  fields: { expert_notes?: string | null; decline_reason?: string } = {}
): Promise<ConsultationWithUsers | null> => {
  await withTransaction(async (client) => {
    const current = await client.query<Consultation>('SELECT * FROM consultations WHERE id = $1 FOR UPDATE', [
      consultationId,
    ]);
    const consultation = current.rows[0];
    if (!consultation) {
      throw HttpError.notFound('Consultation not found');
    }

    assertActionAllowed(consultation, actorId, action);

    const updates = ['status = $1'];
    const values: unknown[] = [CONSULTATION_ACTIONS[action].to];

    if (action === 'accept') {
      values.push(fields.expert_notes ?? null);
      updates.push(`expert_notes = $${values.length}`);
    }
    if (action === 'decline') {
      values.push(fields.decline_reason ?? null);
      updates.push(`decline_reason = $${values.length}`);
    }

    values.push(consultationId);
    await client.query(
      `UPDATE consultations SET ${updates.join(', ')}, updated_at = CURRENT_TIMESTAMP WHERE id = $${values.length}`,
      values
    );
  });

  return findConsultation(consultationId);
};
