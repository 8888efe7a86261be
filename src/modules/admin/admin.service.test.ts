import { describe, it, expect, beforeEach, vi } from 'vitest';
import { fakeDb } from '../../test/mocks/fakeDb';

vi.mock('../../connections', async () => (await import('../../test/mocks/fakeDb')).connectionsMock());

import { USER_ROLES } from '../../constants';
import { getPlatformStats, tallyCounts } from './admin.service';

describe('tallyCounts', () => {
  it('fills missing keys with zero', () => {
    expect(tallyCounts([{ key: 'farmer', count: 3 }, { key: 'expert', count: 1 }], USER_ROLES)).toEqual({
      admin: 0,
      expert: 1,
      farmer: 3,
      customer: 0,
      moderator: 0,
    });
  });

  it('keeps keys outside the expected list', () => {
    expect(tallyCounts([{ key: 'legacy', count: 2 }], ['admin'])).toEqual({ admin: 0, legacy: 2 });
  });
});

describe('getPlatformStats', () => {
  beforeEach(() => {
    fakeDb.reset();
    fakeDb.respond('FROM users GROUP BY role', [
      { key: 'farmer', count: 3 },
      { key: 'admin', count: 1 },
    ]);
    fakeDb.respond('FROM products', [{ total: 10, out_of_stock: 2 }]);
    fakeDb.respond('SUM(total_amount)', [{ revenue: '250.00' }]);
    fakeDb.respond(/FROM orders[\s\S]*GROUP BY status/, [
      { key: 'completed', count: 2 },
      { key: 'pending', count: 1 },
    ]);
    fakeDb.respond('FROM consultations', [{ key: 'pending', count: 2 }]);
    fakeDb.respond('FROM tips', [{ tips: 5, success_stories: 3, community_messages: 7 }]);
  });

  it('combines every group into one summary', async () => {
    await expect(getPlatformStats({})).resolves.toEqual({
      users: { total: 4, by_role: { admin: 1, expert: 0, farmer: 3, customer: 0, moderator: 0 } },
      products: { total: 10, out_of_stock: 2 },
      orders: {
        total: 3,
        by_status: { pending: 1, processing: 0, completed: 2, cancelled: 0 },
        revenue: '250.00',
      },
      consultations: {
        total: 2,
        by_status: { pending: 2, accepted: 0, declined: 0, completed: 0, cancelled: 0 },
      },
      tips: 5,
      success_stories: 3,
      community_messages: 7,
    });
  });

  it('restricts orders and consultations to the date range', async () => {
    const start = new Date('2025-01-01T00:00:00Z');
    await getPlatformStats({ start_date: start });

    const [revenue] = fakeDb.find('SUM(total_amount)');
    expect(revenue.text).toContain("WHERE created_at >= $1 AND status = 'completed'");
    expect(revenue.params).toEqual([start]);
    expect(fakeDb.find('FROM consultations')[0].params).toEqual([start]);
    expect(fakeDb.find('FROM users')[0].params).toEqual([]);
  });
});
