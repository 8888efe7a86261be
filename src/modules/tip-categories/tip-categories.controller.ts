import { Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { pool } from '../../connections';
import type { TipCategory } from '../../connections/db/models';
import { createTipCategorySchema, updateTipCategorySchema } from './tip-categories.validation';
import { ResponseHandler } from '../../utils/response';
import { HttpError } from '../../utils/errors';
import { parseId } from '../../utils/validation';
import { uniqueSlug } from '../../utils/slug';

type TipCategoryWithCount = TipCategory & { tips_count: number };

const assertNameAvailable = async (name: string, exceptId: number | null = null) => {
  const result = await pool.query('SELECT 1 FROM tip_categories WHERE LOWER(name) = LOWER($1) AND id <> $2', [
    name,
    exceptId ?? 0,
  ]);
  if (result.rows.length > 0) {
    throw new HttpError(409, 'The name has already been taken.', 'CONFLICT', { name: ['The name has already been taken.'] });
  }
};

export const getTipCategories = async (_req: AuthRequest, res: Response) => {
  try {
    const result = await pool.query<TipCategoryWithCount>(
      `SELECT tc.*,
              (SELECT COUNT(*)::int FROM tips t WHERE t.category_id = tc.id AND t.deleted_at IS NULL) AS tips_count
       FROM tip_categories tc
       ORDER BY tc.name ASC`
    );

    const categories = result.rows;
    return ResponseHandler.success(res, {
      categories,
      total_categories: categories.length,
      total_tips: categories.reduce((sum, category) => sum + category.tips_count, 0),
    });
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to load tip categories');
  }
};

export const createTipCategory = async (req: AuthRequest, res: Response) => {
  try {
    const input = createTipCategorySchema.parse(req.body);
    await assertNameAvailable(input.name);

    const slug = await uniqueSlug(
      input.name,
      async (candidate) => (await pool.query('SELECT 1 FROM tip_categories WHERE slug = $1', [candidate])).rows.length > 0,
      'category'
    );

    const result = await pool.query<TipCategory>(
      `INSERT INTO tip_categories (name, slug, description, icon)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [input.name, slug, input.description ?? null, input.icon ?? null]
    );

    return ResponseHandler.created(res, { category: result.rows[0] }, 'Category created successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to create category');
  }
};

export const updateTipCategory = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Category not found');
    }

    const input = updateTipCategorySchema.parse(req.body);
    if (input.name !== undefined) {
      await assertNameAvailable(input.name, id);
    }

    const updateFields: string[] = [];
    const values: unknown[] = [];
    const assign = (column: string, value: unknown) => {
      values.push(value);
      updateFields.push(`${column} = $${values.length}`);
    };

    if (input.name !== undefined) assign('name', input.name);
    if (input.description !== undefined) assign('description', input.description);
    if (input.icon !== undefined) assign('icon', input.icon);

    values.push(id);
    const result = await pool.query<TipCategory>(
      `UPDATE tip_categories
       SET ${[...updateFields, 'updated_at = CURRENT_TIMESTAMP'].join(', ')}
       WHERE id = $${values.length}
       RETURNING *`,
      values
    );

    if (result.rows.length === 0) {
      return ResponseHandler.notFound(res, 'Category not found');
    }

    return ResponseHandler.success(res, { category: result.rows[0] }, 'Category updated successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to update category');
  }
};

export const deleteTipCategory = async (req: AuthRequest, res: Response) => {
  try {
    const id = parseId(req.params.id);
    if (id === null) {
      return ResponseHandler.notFound(res, 'Category not found');
    }

    const result = await pool.query('DELETE FROM tip_categories WHERE id = $1 RETURNING id', [id]);
    if (result.rows.length === 0) {
      return ResponseHandler.notFound(res, 'Category not found');
    }

    return ResponseHandler.success(res, undefined, 'Category deleted successfully');
  } catch (error) {
    return ResponseHandler.fromError(res, error, 'Failed to delete category');
  }
};
