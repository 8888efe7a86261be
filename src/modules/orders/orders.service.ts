import type { PoolClient } from 'pg';
import { pool, withTransaction } from '../../connections';
import type { Order, OrderWithItems } from '../../connections/db/models';
import { ORDER_STATUS, USER_ROLE, canTransitionOrder } from '../../constants';
import type { OrderStatus, UserRole } from '../../constants';
import { HttpError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { userSummaryJson } from '../../utils/sql';
import type { CreateOrderBody } from './orders.validation';

export interface OrderActor {
  id: number;
  role: UserRole;
}

const ORDER_SELECT = `
  SELECT o.*,
         ${userSummaryJson('u')} AS user,
         COALESCE((
           SELECT json_agg(json_build_object(
             'id', oi.id,
             'order_id', oi.order_id,
             'product_id', oi.product_id,
             'quantity', oi.quantity,
             'unit_price', oi.unit_price::text,
             'total_price', oi.total_price::text,
             'status', oi.status,
             'created_at', oi.created_at,
             'updated_at', oi.updated_at,
             'product', CASE WHEN p.id IS NULL THEN NULL ELSE json_build_object(
               'id', p.id,
               'name', p.name,
               'image', p.image,
               'user_id', p.user_id,
               'seller', ${userSummaryJson('s')}
             ) END
           ) ORDER BY oi.id)
           FROM order_items oi
           LEFT JOIN products p ON p.id = oi.product_id
           LEFT JOIN users s ON s.id = p.user_id
           WHERE oi.order_id = o.id
         ), '[]'::json) AS items
  FROM orders o
  LEFT JOIN users u ON u.id = o.user_id`;

// Prices are DECIMAL(10,2); arithmetic happens in cents
export const toCents = (amount: string | number): number => Math.round(Number(amount) * 100);
export const fromCents = (cents: number): string => (cents / 100).toFixed(2);

/**
 * Who may move an order from one status to another. Admins and sellers of
 * an item drive the order forward; the buyer may only cancel a pending order.
 */
export const canActorSetOrderStatus = (
  actor: { isAdmin: boolean; isBuyer: boolean; isSeller: boolean },
  from: OrderStatus,
  to: OrderStatus
): boolean => {
  if (actor.isAdmin || actor.isSeller) {
    return true;
  }
  return actor.isBuyer && from === ORDER_STATUS.PENDING && to === ORDER_STATUS.CANCELLED;
};

const assertTransition = (from: OrderStatus, to: OrderStatus) => {
  if (!canTransitionOrder(from, to)) {
    throw HttpError.unprocessable(`Cannot change status from ${from} to ${to}`, {
      status: [`Cannot change status from ${from} to ${to}.`],
    });
  }
};

export const findOrders = async (where: string = '', params: unknown[] = []): Promise<OrderWithItems[]> => {
  const result = await pool.query<OrderWithItems>(
    `${ORDER_SELECT} ${where} ORDER BY o.created_at DESC, o.id DESC`,
    params
  );
  return result.rows;
};

export const findOrderById = async (id: number): Promise<OrderWithItems | null> => {
  const orders = await findOrders('WHERE o.id = $1', [id]);
  return orders[0] ?? null;
};

/**
 * Prices the lines from current product prices, checks stock, stores the
 * order with its items and decrements stock, all in one transaction.
 */
export const createOrder = async (userId: number, input: CreateOrderBody): Promise<OrderWithItems | null> => {
  const orderId = await withTransaction(async (client) => {
    const requested = new Map<number, number>();
    const lines: { productId: number; quantity: number; unitCents: number }[] = [];

    for (const [index, item] of input.items.entries()) {
      const productResult = await client.query<{ id: number; price: string; stock: number; name: string }>(
        'SELECT id, name, price, stock FROM products WHERE id = $1 FOR UPDATE',
        [item.product_id]
      );
      const product = productResult.rows[0];
      if (!product) {
        throw HttpError.unprocessable('The selected product is invalid.', {
          [`items.${index}.product_id`]: ['The selected product is invalid.'],
        });
      }

      const total = (requested.get(product.id) ?? 0) + item.quantity;
      if (total > product.stock) {
        throw HttpError.unprocessable(`Insufficient stock for ${product.name}`, {
          [`items.${index}.quantity`]: [`Only ${product.stock} left in stock.`],
        });
      }
      requested.set(product.id, total);

      lines.push({ productId: product.id, quantity: item.quantity, unitCents: toCents(product.price) });
    }

    const totalCents = lines.reduce((sum, line) => sum + line.unitCents * line.quantity, 0);

    const orderResult = await client.query<{ id: number }>(
      `INSERT INTO orders (user_id, total_amount, status, shipping_address, phone_number, notes)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING id`,
      [userId, fromCents(totalCents), ORDER_STATUS.PENDING, input.shipping_address, input.phone_number, input.notes ?? null]
    );
    const newOrderId = orderResult.rows[0].id;

    for (const line of lines) {
      await client.query(
        `INSERT INTO order_items (order_id, product_id, quantity, unit_price, total_price, status)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          newOrderId,
          line.productId,
          line.quantity,
          fromCents(line.unitCents),
          fromCents(line.unitCents * line.quantity),
          ORDER_STATUS.PENDING,
        ]
      );
    }

    for (const [productId, quantity] of requested) {
      await client.query('UPDATE products SET stock = stock - $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2', [
        quantity,
        productId,
      ]);
    }

    return newOrderId;
  });

  logger.info('Order created', { orderId, userId });
  return findOrderById(orderId);
};

// items already cancelled or completed on their own keep their status and stock
const SETTLED_ITEM_STATUSES: OrderStatus[] = [ORDER_STATUS.CANCELLED, ORDER_STATUS.COMPLETED];

const restockOpenItems = async (client: PoolClient, orderId: number) => {
  await client.query(
    `UPDATE products p
     SET stock = p.stock + r.quantity, updated_at = CURRENT_TIMESTAMP
     FROM (
       SELECT product_id, SUM(quantity)::int AS quantity
       FROM order_items
       WHERE order_id = $1 AND status <> ALL($2::text[])
       GROUP BY product_id
     ) r
     WHERE p.id = r.product_id`,
    [orderId, SETTLED_ITEM_STATUSES]
  );
};

export const updateOrderStatus = async (
  actor: OrderActor,
  orderId: number,
  status: OrderStatus
): Promise<OrderWithItems | null> => {
  await withTransaction(async (client) => {
    const orderResult = await client.query<Order>('SELECT * FROM orders WHERE id = $1 FOR UPDATE', [orderId]);
    const order = orderResult.rows[0];
    if (!order) {
      throw HttpError.notFound('Order not found');
    }

    const sellerResult = await client.query(
      `SELECT 1 FROM order_items oi JOIN products p ON p.id = oi.product_id
       WHERE oi.order_id = $1 AND p.user_id = $2 LIMIT 1`,
      [orderId, actor.id]
    );

    const allowed = canActorSetOrderStatus(
      {
        isAdmin: actor.role === USER_ROLE.ADMIN,
        isBuyer: order.user_id === actor.id,
        isSeller: sellerResult.rows.length > 0,
      },
      order.status,
      status
    );
    if (!allowed) {
      throw HttpError.forbidden('You are not allowed to change this order');
    }

    assertTransition(order.status, status);

    if (status === ORDER_STATUS.CANCELLED) {
      await restockOpenItems(client, orderId);
    }

    await client.query('UPDATE orders SET status = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2', [
      status,
      orderId,
    ]);
    await client.query(
      `UPDATE order_items SET status = $1, updated_at = CURRENT_TIMESTAMP
       WHERE order_id = $2 AND status <> ALL($3::text[])`,
      [status, orderId, SETTLED_ITEM_STATUSES]
    );
  });

  logger.info('Order status updated', { orderId, status, actorId: actor.id });
  return findOrderById(orderId);
};

export const updateOrderItemStatus = async (
  actor: OrderActor,
  orderId: number,
  itemId: number,
  status: OrderStatus
): Promise<OrderWithItems | null> => {
  await withTransaction(async (client) => {
    const itemResult = await client.query<{
      id: number;
      product_id: number;
      quantity: number;
      status: OrderStatus;
      seller_id: number | null;
    }>(
      `SELECT oi.id, oi.product_id, oi.quantity, oi.status, p.user_id AS seller_id
       FROM order_items oi
       LEFT JOIN products p ON p.id = oi.product_id
       WHERE oi.order_id = $1 AND oi.id = $2
       FOR UPDATE OF oi`,
      [orderId, itemId]
    );
    const item = itemResult.rows[0];
    if (!item) {
      throw HttpError.notFound('Order item not found');
    }

    if (actor.role !== USER_ROLE.ADMIN && item.seller_id !== actor.id) {
      throw HttpError.forbidden('Only the seller of this item can change its status');
    }

    assertTransition(item.status, status);

    if (status === ORDER_STATUS.CANCELLED) {
      await client.query('UPDATE products SET stock = stock + $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2', [
        item.quantity,
        item.product_id,
      ]);
    }

    await client.query('UPDATE order_items SET status = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2', [
      status,
      itemId,
    ]);

    // cancelled lines do not hold the order open
    const tally = await client.query<{ open: number; completed: number }>(
      `SELECT COUNT(*) FILTER (WHERE status <> ALL($2::text[]))::int AS open,
              COUNT(*) FILTER (WHERE status = $3)::int AS completed
       FROM order_items WHERE order_id = $1`,
      [orderId, SETTLED_ITEM_STATUSES, ORDER_STATUS.COMPLETED]
    );
    if (tally.rows[0].open === 0 && tally.rows[0].completed > 0) {
      await client.query('UPDATE orders SET status = $1, updated_at = CURRENT_TIMESTAMP WHERE id = $2', [
        ORDER_STATUS.COMPLETED,
        orderId,
      ]);
    }
  });

  logger.info('Order item status updated', { orderId, itemId, status, actorId: actor.id });
  return findOrderById(orderId);
};
