import express from 'express';
import * as productsController from './products.controller';
import { authenticate, requireRole } from '../../middlewares/auth.middleware';
import { USER_ROLE } from '../../constants';
import { productImageUpload } from '../upload/upload.middleware';

const router = express.Router();

router.get('/', productsController.getProducts);
router.get('/featured', productsController.getFeaturedProducts);
router.get('/:id', productsController.getProductById);

router.post(
  '/',
  authenticate,
  requireRole(USER_ROLE.FARMER, USER_ROLE.ADMIN),
  productImageUpload,
  productsController.createProduct
);
// Multipart updates go through POST so the image can be replaced
router.post('/:id', authenticate, productImageUpload, productsController.updateProduct);
router.delete('/:id', authenticate, productsController.deleteProduct);

export default router;
