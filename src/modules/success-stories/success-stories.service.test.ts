import { describe, it, expect, beforeEach, vi } from 'vitest';
import { fakeDb } from '../../test/mocks/fakeDb';

vi.mock('../../connections', async () => (await import('../../test/mocks/fakeDb')).connectionsMock());

import { addComment, createStory, listStories, softDeleteStory, updateStory } from './success-stories.service';
import type { SuccessStory } from '../../connections/db/models';

const story: SuccessStory = {
  id: 6,
  user_id: 2,
  title: 'Doubling maize yield',
  content: 'Intercropping with beans',
  location: null,
  crop_type: 'maize',
  yield_improvement: '40.00',
  yield_unit: '%',
  is_featured: false,
  views_count: 0,
  likes_count: 0,
  comments_count: 0,
  created_at: new Date('2025-06-01T10:00:00Z'),
  updated_at: new Date('2025-06-01T10:00:00Z'),
  deleted_at: null,
};

const upload = (name: string) => ({
  path: `success_stories/${name}`,
  originalName: name,
  mimeType: 'image/jpeg',
  size: 1024,
});

describe('createStory', () => {
  beforeEach(() => {
    fakeDb.reset();
    fakeDb.respond('INSERT INTO success_stories', [{ id: 6 }]);
  });

  it('stores images in upload order with their captions', async () => {
    await createStory(
      2,
      { title: 'Doubling maize yield', content: 'Intercropping with beans', captions: ['Before', null] },
      [upload('a.jpg'), upload('b.jpg')]
    );

    const images = fakeDb.find('INSERT INTO story_images');
    expect(images.map((q) => q.params)).toEqual([
      [6, 'success_stories/a.jpg', 'Before', 0],
      [6, 'success_stories/b.jpg', null, 1],
    ]);
  });
});

describe('updateStory', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('appends new images after the existing ones', async () => {
    fakeDb.respond('MAX(display_order)', [{ next_order: 3 }]);

    await updateStory(story, 2, { title: 'Tripling maize yield' }, [upload('c.jpg')]);

    expect(fakeDb.find('UPDATE success_stories SET')[0].params).toEqual(['Tripling maize yield', 6]);
    expect(fakeDb.find('INSERT INTO story_images')[0].params).toEqual([6, 'success_stories/c.jpg', null, 3]);
  });

  it('skips the update statement when no field changed', async () => {
    await updateStory(story, 2, {}, []);
    expect(fakeDb.find('UPDATE success_stories SET')).toHaveLength(0);
    expect(fakeDb.find('MAX(display_order)')).toHaveLength(0);
    expect(fakeDb.find('INSERT INTO story_images')).toHaveLength(0);
  });
});

describe('softDeleteStory', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('returns the image paths to remove', async () => {
    fakeDb.respond('DELETE FROM story_images', [{ image_path: 'success_stories/a.jpg' }]);
    await expect(softDeleteStory(6)).resolves.toEqual(['success_stories/a.jpg']);
    expect(fakeDb.find('SET deleted_at = CURRENT_TIMESTAMP')[0].params).toEqual([6]);
  });
});

describe('addComment', () => {
  beforeEach(() => {
    fakeDb.reset();
    fakeDb.respond('FROM success_stories WHERE id = $1 AND deleted_at IS NULL FOR UPDATE', [{ id: 6 }]);
  });

  it('stores the comment and recounts', async () => {
    fakeDb.respond('INSERT INTO story_comments', [{ id: 30 }]);
    fakeDb.respond('WHERE c.id = $1', [{ id: 30, comment: 'Great result' }]);

    const comment = await addComment(6, 4, { comment: 'Great result' });

    expect(comment).toEqual({ id: 30, comment: 'Great result' });
    expect(fakeDb.find('INSERT INTO story_comments')[0].params).toEqual([6, 4, 'Great result', null]);
    expect(fakeDb.find('SET comments_count')[0].params).toEqual([6]);
  });

  it('rejects a parent that belongs to another story', async () => {
    await expect(addComment(6, 4, { comment: 'Agreed', parent_id: 99 })).rejects.toMatchObject({
      statusCode: 422,
      details: { parent_id: ['The selected parent id is invalid.'] },
    });
    expect(fakeDb.find('INSERT INTO story_comments')).toHaveLength(0);
  });
});

describe('listStories', () => {
  beforeEach(() => {
    fakeDb.reset();
    fakeDb.respond('COUNT(*)::int AS count', [{ count: 0 }]);
  });

  it('binds filters before the viewer and page parameters', async () => {
    await listStories({
      viewerId: 4,
      filters: { search: '50%', crop_type: 'rice', featured: true, sort: 'popular' },
      page: { page: 2, limit: 10, offset: 10 },
    });

    const [count, select] = fakeDb.queries;
    expect(count.params).toEqual(['%50\\%%', 'rice']);
    expect(select.params).toEqual(['%50\\%%', 'rice', 4, 10, 10]);
    expect(select.text).toContain('s.is_featured = TRUE');
    expect(select.text).toContain('ORDER BY s.likes_count DESC');
  });
});
