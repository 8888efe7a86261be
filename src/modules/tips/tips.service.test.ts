import { describe, it, expect, beforeEach, vi } from 'vitest';
import { fakeDb } from '../../test/mocks/fakeDb';

vi.mock('../../connections', async () => (await import('../../test/mocks/fakeDb')).connectionsMock());

import type { Tip } from '../../connections/db/models';
import { createTip, listTips, softDeleteTip, updateTip, viewTip } from './tips.service';

const page = { page: 1, limit: 10, offset: 0 };

const tip: Tip = {
  id: 7,
  user_id: 2,
  category_id: 1,
  title: 'Composting Basics',
  slug: 'composting-basics',
  content: 'Layer greens and browns',
  tags: ['soil'],
  is_featured: false,
  views_count: 0,
  likes_count: 0,
  created_at: new Date('2025-06-01T10:00:00Z'),
  updated_at: new Date('2025-06-01T10:00:00Z'),
  deleted_at: null,
};

beforeEach(() => {
  fakeDb.reset();
});

describe('createTip', () => {
  it('suffixes the slug until it is free', async () => {
    const taken = ['composting-basics', 'composting-basics-1'];
    fakeDb.respond('SELECT 1 FROM tip_categories', [{ exists: 1 }]);
    fakeDb.respond('SELECT 1 FROM tips WHERE slug = $1', (params) =>
      taken.includes(String(params[0])) ? [{ exists: 1 }] : []
    );
    fakeDb.respond('INSERT INTO tips', [{ id: 7 }]);

    await createTip(2, { title: 'Composting Basics', content: 'Layer greens and browns', category_id: 1, tags: ['soil'] });

    expect(fakeDb.find('INSERT INTO tips')[0].params).toEqual([
      2,
      1,
      'Composting Basics',
      'composting-basics-2',
      'Layer greens and browns',
      '["soil"]',
      false,
    ]);
  });

  it('rejects an unknown category', async () => {
    await expect(createTip(2, { title: 'Mulching', content: 'Keep soil covered', category_id: 99 })).rejects.toMatchObject({
      statusCode: 422,
      details: { category_id: ['The selected category id is invalid.'] },
    });
    expect(fakeDb.find('INSERT INTO tips')).toHaveLength(0);
  });
});

describe('updateTip', () => {
  it('keeps the slug when the title changes', async () => {
    await updateTip(tip, 2, { title: 'Composting in Winter' });

    const [update] = fakeDb.find('UPDATE tips SET');
    expect(update.text).not.toContain('slug');
    expect(update.params).toEqual(['Composting in Winter', 7]);
  });
});

describe('listTips', () => {
  it('binds NULL as the viewer for guests', async () => {
    fakeDb.respond('COUNT(*)::int AS count', [{ count: 0 }]);

    await listTips({ viewerId: null, page });

    const [, select] = fakeDb.queries;
    expect(select.text).toContain('CASE WHEN $1::int IS NULL THEN FALSE');
    expect(select.params).toEqual([null, 10, 0]);
  });

  it('orders saved tips by when they were saved', async () => {
    fakeDb.respond('COUNT(*)::int AS count', [{ count: 2 }]);

    const result = await listTips({ viewerId: 4, savedBy: 4, page });

    const [count, select] = fakeDb.queries;
    expect(result.total).toBe(2);
    expect(count.text).toContain('JOIN saved_tips saved ON saved.tip_id = t.id AND saved.user_id = $1');
    expect(select.text).toContain('ORDER BY saved.created_at DESC, t.id DESC');
    expect(select.params).toEqual([4, 4, 10, 0]);
  });
});

describe('viewTip', () => {
  it('returns null without loading a deleted or missing tip', async () => {
    await expect(viewTip(7, null)).resolves.toBeNull();
    expect(fakeDb.queries).toHaveLength(1);
  });
});

describe('softDeleteTip', () => {
  it('stamps deleted_at once', async () => {
    await softDeleteTip(7);

    expect(fakeDb.queries[0]).toEqual({
      text: 'UPDATE tips SET deleted_at = CURRENT_TIMESTAMP WHERE id = $1 AND deleted_at IS NULL',
      params: [7],
    });
  });
});
