import express from 'express';
import * as ordersController from './orders.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';

const router = express.Router();

// All order routes require authentication
router.use(authenticate);

router.post('/', ordersController.createOrder);
router.get('/my-orders', ordersController.getMyOrders);
router.get('/', requireRole(USER_ROLE.ADMIN), ordersController.getOrders);
router.get('/:id', ordersController.getOrderById);
router.patch('/:id/status', ordersController.updateOrderStatus);
router.patch('/:orderId/items/:itemId/status', ordersController.updateOrderItemStatus);

export default router;
