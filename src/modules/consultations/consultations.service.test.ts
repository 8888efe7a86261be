import { describe, it, expect, beforeEach, vi } from 'vitest';
import { fakeDb } from '../../test/mocks/fakeDb';

vi.mock('../../connections', async () => (await import('../../test/mocks/fakeDb')).connectionsMock());

import { applyAction, assertActionAllowed, bookConsultation } from './consultations.service';
import type { ConsultationStatus } from '../../constants';

const booking = (status: ConsultationStatus) => ({ farmer_id: 1, expert_id: 2, status });

describe('assertActionAllowed', () => {
  it('lets the expert accept, decline and complete', () => {
    expect(() => assertActionAllowed(booking('pending'), 2, 'accept')).not.toThrow();
    expect(() => assertActionAllowed(booking('pending'), 2, 'decline')).not.toThrow();
    expect(() => assertActionAllowed(booking('accepted'), 2, 'complete')).not.toThrow();
  });

  it('forbids the farmer from expert-only actions', () => {
    expect(() => assertActionAllowed(booking('pending'), 1, 'accept')).toThrowError(
      expect.objectContaining({ statusCode: 403 })
    );
  });

  it('forbids strangers from cancelling', () => {
    expect(() => assertActionAllowed(booking('pending'), 3, 'cancel')).toThrowError(
      expect.objectContaining({ statusCode: 403 })
    );
  });

  it('lets either party cancel pending and accepted bookings', () => {
    expect(() => assertActionAllowed(booking('pending'), 1, 'cancel')).not.toThrow();
    expect(() => assertActionAllowed(booking('accepted'), 2, 'cancel')).not.toThrow();
  });

  it('rejects actions from the wrong status with 422', () => {
    expect(() => assertActionAllowed(booking('accepted'), 2, 'accept')).toThrowError(
      expect.objectContaining({ statusCode: 422, message: 'Consultation is not in pending status' })
    );
    expect(() => assertActionAllowed(booking('pending'), 2, 'complete')).toThrowError(
      expect.objectContaining({ statusCode: 422, message: 'Consultation must be accepted before completing' })
    );
    expect(() => assertActionAllowed(booking('completed'), 1, 'cancel')).toThrowError(
      expect.objectContaining({ statusCode: 422 })
    );
  });

  it('checks the actor before the status', () => {
    expect(() => assertActionAllowed(booking('declined'), 1, 'complete')).toThrowError(
      expect.objectContaining({ statusCode: 403 })
    );
  });
});

describe('applyAction', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('stores the decline reason with the new status', async () => {
    fakeDb.respond('FOR UPDATE', [{ id: 10, ...booking('pending') }]);

    await applyAction(2, 10, 'decline', { decline_reason: 'Fully booked that week' });

    const [update] = fakeDb.find('UPDATE consultations');
    expect(update.text).toContain('status = $1, decline_reason = $2');
    expect(update.params).toEqual(['declined', 'Fully booked that week', 10]);
    expect(fakeDb.queries.at(-2)?.text).toBe('COMMIT');
  });

  it('rolls back and reports 404 for unknown consultations', async () => {
    await expect(applyAction(2, 99, 'accept')).rejects.toMatchObject({ statusCode: 404 });
    expect(fakeDb.find('UPDATE consultations')).toHaveLength(0);
    expect(fakeDb.queries.at(-1)?.text).toBe('ROLLBACK');
  });
});

describe('bookConsultation', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('rejects a user who is not an expert', async () => {
    await expect(
      bookConsultation(1, { expert_id: 7, consultation_date: new Date('2030-01-01'), description: 'Leaf spots' })
    ).rejects.toMatchObject({
      statusCode: 422,
      details: { expert_id: ['The selected expert id is invalid.'] },
    });
  });

  it('stores a pending booking', async () => {
    fakeDb.respond('FROM users WHERE id = $1 AND role = $2', [{ '?column?': 1 }]);
    fakeDb.respond('INSERT INTO consultations', [{ id: 3 }]);
    const date = new Date('2030-01-01T09:00:00Z');

    await bookConsultation(1, { expert_id: 2, consultation_date: date, description: 'Leaf spots' });

    const [insert] = fakeDb.find('INSERT INTO consultations');
    expect(insert.params).toEqual([1, 2, date, 'Leaf spots', 'pending']);
  });
});
