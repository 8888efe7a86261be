import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { pool } from '../../connections';
import type { Category } from '../../connections/db/models';
import { createCategorySchema, updateCategorySchema } from './categories.validation';
import { ResponseHandler } from '../../utils/response';
import { parseId } from '../../utils/validation';

export const getCategories = async (_req: AuthRequest, res: Response) => {
  try {
    const result = await pool.query<Category>('SELECT * FROM categories ORDER BY name ASC');
    return ResponseHandler.success(res, { categories: result.rows });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load categories');
  }
};

export const createCategory = async (req: AuthRequest, res: Response) => {
  try {
    const { name, description } = createCategorySchema.parse(req.body);

    const result = await pool.query<Category>(
      'INSERT INTO categories (name, description) VALUES ($1, $2) RETURNING *',
      [name, description ?? null]
    );

    return ResponseHandler.created(res, { category: result.rows[0] }, 'Category created successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to create category');
  }
};

export const updateCategory = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Category not found');
    }

    const input = updateCategorySchema.parse(req.body);

    // COALESCE keeps the stored name when none is sent; description may be cleared
    const result = await pool.query<Category>(
      `UPDATE categories
       SET name = COALESCE($1, name),
           description = CASE WHEN $2::boolean THEN $3 ELSE description END,
           updated_at = CURRENT_TIMESTAMP
       WHERE id = $4
       RETURNING *`,
      [input.name ?? null, input.description !== undefined, input.description ?? null, id]
    );

    if (result.rows.length === 0) {
      return ResponseHandler.notFound(res, 'Category not found');
    }

    return ResponseHandler.success(res, { category: result.rows[0] }, 'Category updated successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to update category');
  }
};

export const deleteCategory = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Category not found');
    }

    const result = await pool.query('DELETE FROM categories WHERE id = $1 RETURNING id', [id]);
    if (result.rows.length === 0) {
      return ResponseHandler.notFound(res, 'Category not found');
    }

    return ResponseHandler.success(res, undefined, 'Category deleted successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to delete category');
  }
};
