import { pool } from '../../connections';
import { CONSULTATION_STATUS, ORDER_STATUSES, USER_ROLES } from '../../constants';
import type { StatsQuery } from './admin.validation';

interface GroupCount {
  key: string;
  count: number;
}

/**
 * Every expected key with its count, zero when the group query returned no row
 */
export const tallyCounts = (rows: GroupCount[], keys: readonly string[]): Record<string, number> => {
  const tally: Record<string, number> = {};
  for (const key of keys) {
    tally[key] = 0;
  }
  for (const row of rows) {
    tally[row.key] = (tally[row.key] ?? 0) + row.count;
  }
  return tally;
};

export interface PlatformStats {
  users: { total: number; by_role: Record<string, number> };
  products: { total: number; out_of_stock: number };
  orders: { total: number; by_status: Record<string, number>; revenue: string };
  consultations: { total: number; by_status: Record<string, number> };
  tips: number;
  success_stories: number;
  community_messages: number;
}

const sum = (tally: Record<string, number>) => Object.values(tally).reduce((total, count) => total + count, 0);

export const getPlatformStats = async ({ start_date, end_date }: StatsQuery): Promise<PlatformStats> => {
  // range applies to orders and consultations
  const params: Date[] = [];
  const range: string[] = [];
  if (start_date) {
    params.push(start_date);
    range.push(`created_at >= $${params.length}`);
  }
  if (end_date) {
    params.push(end_date);
    range.push(`created_at <= $${params.length}`);
  }
  const where = range.length > 0 ? `WHERE ${range.join(' AND ')}` : '';

  const [users, products, orders, revenue, consultations, content] = await Promise.all([
    pool.query<GroupCount>('SELECT role AS key, COUNT(*)::int AS count FROM users GROUP BY role'),
    pool.query<{ total: number; out_of_stock: number }>(
      `SELECT COUNT(*)::int AS total,
              COUNT(*) FILTER (WHERE stock = 0)::int AS out_of_stock
       FROM products`
    ),
    pool.query<GroupCount>(`SELECT status AS key, COUNT(*)::int AS count FROM orders ${where} GROUP BY status`, params),
    pool.query<{ revenue: string }>(
      `SELECT COALESCE(SUM(total_amount), 0)::text AS revenue FROM orders
       ${where ? `${where} AND` : 'WHERE'} status = 'completed'`,
      params
    ),
    pool.query<GroupCount>(
      `SELECT status::text AS key, COUNT(*)::int AS count FROM consultations ${where} GROUP BY status`,
      params
    ),
    pool.query<{ tips: number; success_stories: number; community_messages: number }>(
      `SELECT
         (SELECT COUNT(*)::int FROM tips WHERE deleted_at IS NULL) AS tips,
         (SELECT COUNT(*)::int FROM success_stories WHERE deleted_at IS NULL) AS success_stories,
         (SELECT COUNT(*)::int FROM community_messages WHERE deleted_at IS NULL) AS community_messages`
    ),
  ]);

  const byRole = tallyCounts(users.rows, USER_ROLES);
  const byOrderStatus = tallyCounts(orders.rows, ORDER_STATUSES);
  const byConsultationStatus = tallyCounts(consultations.rows, Object.values(CONSULTATION_STATUS));

  return {
    users: { total: sum(byRole), by_role: byRole },
    products: products.rows[0],
    orders: { total: sum(byOrderStatus), by_status: byOrderStatus, revenue: revenue.rows[0].revenue },
    consultations: { total: sum(byConsultationStatus), by_status: byConsultationStatus },
    ...content.rows[0],
  };
};
