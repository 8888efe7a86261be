import express from 'express';
import authRoutes from '../modules/auth/auth.routes';
import categoriesRoutes from '../modules/categories/categories.routes';
import productsRoutes from '../modules/products/products.routes';
import ordersRoutes from '../modules/orders/orders.routes';
import consultationsRoutes from '../modules/consultations/consultations.routes';
import { getExperts } from '../modules/consultations/consultations.controller';
import tipCategoriesRoutes from '../modules/tip-categories/tip-categories.routes';
import tipsRoutes from '../modules/tips/tips.routes';
import successStoriesRoutes from '../modules/success-stories/success-stories.routes';
import communityMessagesRoutes from '../modules/community-messages/community-messages.routes';
import adminRoutes from '../modules/admin/admin.routes';

const router = express.Router();

// API Routes
router.use('/', authRoutes);
router.use('/categories', categoriesRoutes);
router.use('/products', productsRoutes);
router.use('/orders', ordersRoutes);
router.get('/experts', getExperts);
router.use('/consultations', consultationsRoutes);
router.use('/tip-categories', tipCategoriesRoutes);
router.use('/tips', tipsRoutes);
router.use('/success-stories', successStoriesRoutes);
router.use('/community/messages', communityMessagesRoutes);
router.use('/admin', adminRoutes);

export default router;
