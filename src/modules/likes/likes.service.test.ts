import { describe, it, expect, beforeEach, vi } from 'vitest';
import { fakeDb } from '../../test/mocks/fakeDb';

vi.mock('../../connections', async () => (await import('../../test/mocks/fakeDb')).connectionsMock());

import { toggleLike, toggleSave } from './likes.service';

describe('toggleLike', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('adds a like and increments the counter', async () => {
    fakeDb.respond('FOR UPDATE', [{ id: 4 }]);
    fakeDb.respond('INSERT INTO tip_likes', [{ id: 100 }]);
    fakeDb.respond('UPDATE tips SET likes_count', [{ likes_count: 6 }]);

    const result = await toggleLike('tip', 4, 9);

    expect(result).toEqual({ liked: true, likesCount: 6 });
    const [update] = fakeDb.find('UPDATE tips SET likes_count');
    expect(update.params).toEqual([1, 4]);
    expect(fakeDb.queries.at(-1)?.text).toBe('COMMIT');
  });

  it('removes an existing like and decrements the counter', async () => {
    fakeDb.respond('FOR UPDATE', [{ id: 4 }]);
    fakeDb.respond('DELETE FROM story_likes', [{ id: 100 }]);
    fakeDb.respond('UPDATE success_stories SET likes_count', [{ likes_count: 0 }]);

    const result = await toggleLike('story', 4, 9);

    expect(result).toEqual({ liked: false, likesCount: 0 });
    expect(fakeDb.find('INSERT INTO story_likes')).toHaveLength(0);
    expect(fakeDb.find('UPDATE success_stories SET likes_count')[0].params).toEqual([-1, 4]);
  });

  it('leaves the counter alone when a concurrent insert won', async () => {
    fakeDb.respond('FOR UPDATE', [{ id: 4 }]);
    fakeDb.respond('UPDATE community_messages SET likes_count', [{ likes_count: 3 }]);

    const result = await toggleLike('message', 4, 9);

    expect(result).toEqual({ liked: true, likesCount: 3 });
    expect(fakeDb.find('UPDATE community_messages SET likes_count')[0].params).toEqual([0, 4]);
  });

  it('reports a missing target as 404 and rolls back', async () => {
    await expect(toggleLike('tip', 404, 9)).rejects.toMatchObject({ statusCode: 404, message: 'Tip not found' });
    expect(fakeDb.find('tip_likes')).toHaveLength(0);
    expect(fakeDb.queries.at(-1)?.text).toBe('ROLLBACK');
  });

  it('scopes replies to their message', async () => {
    fakeDb.respond('FOR UPDATE', [{ id: 8 }]);
    fakeDb.respond('UPDATE message_replies SET likes_count', [{ likes_count: 1 }]);

    await toggleLike('reply', 8, 9, { column: 'community_message_id', value: 3 });

    const [lock] = fakeDb.find('FOR UPDATE');
    expect(lock.text).toContain('FROM message_replies WHERE id = $1 AND deleted_at IS NULL AND community_message_id = $2');
    expect(lock.params).toEqual([8, 3]);
  });
});

describe('toggleSave', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('saves a tip that was not saved', async () => {
    fakeDb.respond('FOR UPDATE', [{ id: 2 }]);
    await expect(toggleSave(2, 9)).resolves.toEqual({ saved: true });
    expect(fakeDb.find('INSERT INTO saved_tips')[0].params).toEqual([2, 9]);
  });

  it('unsaves a saved tip', async () => {
    fakeDb.respond('FOR UPDATE', [{ id: 2 }]);
    fakeDb.respond('DELETE FROM saved_tips', [{ id: 50 }]);
    await expect(toggleSave(2, 9)).resolves.toEqual({ saved: false });
    expect(fakeDb.find('INSERT INTO saved_tips')).toHaveLength(0);
  });
});
