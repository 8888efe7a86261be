import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { USER_ROLE } from '../../constants';
import { createOrderSchema, updateStatusSchema } from './orders.validation';
import * as ordersService from './orders.service';
import { requireAuthUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { parseId } from '../../utils/validation';

export const createOrder = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const input = createOrderSchema.parse(req.body);

    const order = await ordersService.createOrder(user.id, input);
    return ResponseHandler.created(res, { order }, 'Order created successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Error creating order');
  }
};

export const getMyOrders = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const orders = await ordersService.findOrders('WHERE o.user_id = $1', [user.id]);
    return ResponseHandler.success(res, { orders });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load orders');
  }
};

// Admin only
export const getOrders = async (_req: AuthRequest, res: Response) => {
  try {
    const orders = await ordersService.findOrders();
    return ResponseHandler.success(res, { orders });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load orders');
  }
};

export const getOrderById = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    const order = id === null ? null : await ordersService.findOrderById(id);

    if (!order) {
      return ResponseHandler.notFound(res, 'Order not found');
    }

    if (order.user_id !== user.id && user.role !== USER_ROLE.ADMIN) {
      return ResponseHandler.forbidden(res, 'Unauthorized');
    }

    return ResponseHandler.success(res, { order });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load order');
  }
};

export const updateOrderStatus = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Order not found');
    }

    const { status } = updateStatusSchema.parse(req.body);
    const order = await ordersService.updateOrderStatus(user, id, status);

    return ResponseHandler.success(res, { order }, 'Order status updated successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Error updating order status');
  }
};

export const updateOrderItemStatus = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const orderId = parseId(req.params.orderId);
    const itemId = parseId(req.params.itemId);
    if (orderId === null || itemId === null) {
      return ResponseHandler.notFound(res, 'Order item not found');
    }

    const { status } = updateStatusSchema.parse(req.body);
    const order = await ordersService.updateOrderItemStatus(user, orderId, itemId, status);

    return ResponseHandler.success(res, { order }, 'Order item status updated successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Error updating order item status');
  }
};
