import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { pool } from '../../connections';
import type { Product, ProductWithRelations } from '../../connections/db/models';
import { USER_ROLE } from '../../constants';
import { createProductSchema, productFiltersSchema, updateProductSchema } from './products.validation';
import { requireAuthUser } from '../../middlewares/auth.middleware';
import { ResponseHandler } from '../../utils/response';
import { HttpError } from '../../utils/errors';
import { logger } from '../../utils/logging';
import { parseId } from '../../utils/validation';
import { userSummaryJson } from '../../utils/sql';
import { discardFiles, publicUrl, saveFile, UPLOAD_FOLDER } from '../upload/localStorage.service';

const PRODUCT_SELECT = `
  SELECT p.*,
         CASE WHEN c.id IS NULL THEN NULL
              ELSE json_build_object('id', c.id, 'name', c.name, 'description', c.description)
         END AS category,
         ${userSummaryJson('u')} AS user
  FROM products p
  LEFT JOIN categories c ON c.id = p.category_id
  LEFT JOIN users u ON u.id = p.user_id`;

const withImageUrl = (product: ProductWithRelations) => ({
  ...product,
  image_url: publicUrl(product.image),
});

const findProduct = async (id: number): Promise<ProductWithRelations | null> => {
  const result = await pool.query<ProductWithRelations>(`${PRODUCT_SELECT} WHERE p.id = $1`, [id]);
  return result.rows[0] ?? null;
};

const assertCategoryExists = async (categoryId: number) => {
  const result = await pool.query('SELECT 1 FROM categories WHERE id = $1', [categoryId]);
  if (result.rows.length === 0) {
    throw HttpError.unprocessable('The selected category id is invalid.', {
      category_id: ['The selected category id is invalid.'],
    });
  }
};

const assertCanManage = (product: Product, userId: number, role: string) => {
  if (product.user_id !== userId && role !== USER_ROLE.ADMIN) {
    throw HttpError.forbidden('You can only manage your own products');
  }
};

export const getProducts = async (req: AuthRequest, res: Response) => {
  try {
    const filters = productFiltersSchema.parse(req.query);

    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filters.min_price !== undefined) {
      params.push(filters.min_price);
      conditions.push(`p.price >= $${params.length}`);
    }
    if (filters.max_price !== undefined) {
      params.push(filters.max_price);
      conditions.push(`p.price <= $${params.length}`);
    }
    if (filters.category_id !== undefined) {
      params.push(filters.category_id);
      conditions.push(`p.category_id = $${params.length}`);
    }
    if (filters.created_after) {
      params.push(filters.created_after);
      conditions.push(`p.created_at >= $${params.length}`);
    }
    if (filters.created_before) {
      params.push(filters.created_before);
      conditions.push(`p.created_at <= $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await pool.query<ProductWithRelations>(
      `${PRODUCT_SELECT} ${where} ORDER BY p.created_at DESC, p.id DESC`,
      params
    );

    return ResponseHandler.success(res, { products: result.rows.map(withImageUrl) });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load products');
  }
};

export const getFeaturedProducts = async (_req: AuthRequest, res: Response) => {
  try {
    const result = await pool.query<ProductWithRelations>(
      `${PRODUCT_SELECT} WHERE p.is_featured = TRUE ORDER BY p.created_at DESC, p.id DESC`
    );
    return ResponseHandler.success(res, { products: result.rows.map(withImageUrl) });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load featured products');
  }
};

export const getProductById = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id);
    const product = id === null ? null : await findProduct(id);
    if (!product) {
      return ResponseHandler.notFound(res, 'Product not found');
    }
    return ResponseHandler.success(res, { product: withImageUrl(product) });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load product');
  }
};

export const createProduct = async (req: AuthRequest, res: Response) => {
  let storedImage: string | null = null;
  try {
    const user = requireAuthUser(req);
    const input = createProductSchema.parse(req.body);

    if (!req.file) {
      throw HttpError.unprocessable('The image field is required.', { image: ['The image field is required.'] });
    }

    await assertCategoryExists(input.category_id);

    storedImage = (await saveFile(req.file, UPLOAD_FOLDER.PRODUCT_IMAGES)).path;

    const inserted = await pool.query<{ id: number }>(
      `INSERT INTO products (user_id, category_id, name, description, image, price, stock, location, is_featured)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
       RETURNING id`,
      [
        user.id,
        input.category_id,
        input.name,
        input.description,
        storedImage,
        input.price,
        input.stock ?? 0,
        input.location ?? null,
        input.is_featured ?? false,
      ]
    );

    const product = await findProduct(inserted.rows[0].id);
    logger.info('Product created', { productId: inserted.rows[0].id, userId: user.id });

    return ResponseHandler.created(res, { product: product && withImageUrl(product) }, 'Product created successfully');
  } catch (error) {
    await discardFiles([storedImage]);
    return ResponseHandler.fromError(res, error, 'Failed to create product');
  }
};

export const updateProduct = async (req: AuthRequest, res: Response) => {
  let storedImage: string | null = null;
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    const existing = id === null ? null : await findProduct(id);
    if (!existing) {
      return ResponseHandler.notFound(res, 'Product not found');
    }
    assertCanManage(existing, user.id, user.role);

    const input = updateProductSchema.parse(req.body);
    if (input.category_id !== undefined) {
      await assertCategoryExists(input.category_id);
    }

    const updateFields: string[] = [];
    const values: unknown[] = [];
    const assign = (column: string, value: unknown) => {
      values.push(value);
      updateFields.push(`${column} = $${values.length}`);
    };

    if (input.name !== undefined) assign('name', input.name);
    if (input.description !== undefined) assign('description', input.description);
    if (input.price !== undefined) assign('price', input.price);
    if (input.category_id !== undefined) assign('category_id', input.category_id);
    if (input.is_featured !== undefined) assign('is_featured', input.is_featured);
    if (input.stock !== undefined) assign('stock', input.stock);
    if (input.location !== undefined) assign('location', input.location);

    if (req.file) {
      storedImage = (await saveFile(req.file, UPLOAD_FOLDER.PRODUCT_IMAGES)).path;
      assign('image', storedImage);
    }

    if (updateFields.length > 0) {
      values.push(existing.id);
      await pool.query(
        `UPDATE products SET ${updateFields.join(', ')}, updated_at = CURRENT_TIMESTAMP WHERE id = $${values.length}`,
        values
      );
    }

    if (storedImage) {
      // the row points at the new file now, so the catch below must leave it alone
      storedImage = null;
      await discardFiles([existing.image]);
    }

    const product = await findProduct(existing.id);
    return ResponseHandler.success(res, { product: product && withImageUrl(product) }, 'Product updated successfully');
  } catch (error) {
    await discardFiles([storedImage]);
    return ResponseHandler.fromError(res, error, 'Failed to update product');
  }
};

export const deleteProduct = async (req: AuthRequest, res: Response) => {
  try {
    const user = requireAuthUser(req);
    const id = parseId(req.params.id);
    const existing = id === null ? null : await findProduct(id);
    if (!existing) {
      return ResponseHandler.notFound(res, 'Product not found');
    }
    assertCanManage(existing, user.id, user.role);

    await pool.query('DELETE FROM products WHERE id = $1', [existing.id]);
    await discardFiles([existing.image]);

    logger.info('Product deleted', { productId: existing.id, userId: user.id });
    return ResponseHandler.success(res, undefined, 'Product deleted successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to delete product');
  }
};
