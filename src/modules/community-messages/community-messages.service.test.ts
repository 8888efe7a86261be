import { describe, it, expect, beforeEach, vi } from 'vitest';
import { fakeDb } from '../../test/mocks/fakeDb';

vi.mock('../../connections', async () => (await import('../../test/mocks/fakeDb')).connectionsMock());

import { appConfig } from '../../connections/config/app.config';
import type { CommunityMessage } from '../../connections/db/models';
import { POLL_LIMIT } from '../../constants';
import { createMessage, maxId, pollMessages, softDeleteMessage, updateMessage } from './community-messages.service';

const message: CommunityMessage = {
  id: 8,
  user_id: 2,
  title: null,
  content: 'Anyone planting cassava this week?',
  category: 'general',
  tags: [],
  is_pinned: false,
  is_announcement: false,
  views_count: 0,
  likes_count: 0,
  replies_count: 0,
  last_reply_at: null,
  created_at: new Date('2025-06-01T10:00:00Z'),
  updated_at: new Date('2025-06-01T10:00:00Z'),
  deleted_at: null,
};

describe('maxId', () => {
  it('falls back when there are no rows', () => {
    expect(maxId([], 12)).toBe(12);
  });

  it('picks the highest id', () => {
    expect(maxId([{ id: 14 }, { id: 19 }, { id: 15 }], 12)).toBe(19);
  });
});

describe('pollMessages', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('echoes the cursor when nothing is new', async () => {
    const result = await pollMessages(null, { last_id: 12 });
    expect(result).toEqual({ messages: [], lastId: 12 });

    const [select] = fakeDb.queries;
    expect(select.text).toContain('m.id > $1');
    expect(select.params).toEqual([12, null, POLL_LIMIT, 0]);
  });

  it('filters by id and update time and advances the cursor', async () => {
    fakeDb.respond('FROM community_messages m', [
      { id: 15, attachments: [{ id: 1, file_path: 'communityfiles/plan.pdf' }] },
      { id: 13, attachments: [] },
    ]);
    const since = new Date('2025-06-02T08:00:00Z');

    const result = await pollMessages(4, { last_id: 12, last_updated: since });

    expect(result.lastId).toBe(15);
    expect(result.messages[0].attachments[0].file_url).toBe(`${appConfig.baseUrl}/uploads/communityfiles/plan.pdf`);
    expect(fakeDb.queries[0].params).toEqual([12, since, 4, POLL_LIMIT, 0]);
    expect(fakeDb.queries[0].text).toContain('m.updated_at > $2');
  });

  it('skips the id condition for a zero cursor', async () => {
    await pollMessages(null, { last_id: 0 });
    expect(fakeDb.queries[0].text).not.toContain('m.id >');
  });
});

describe('createMessage', () => {
  beforeEach(() => {
    fakeDb.reset();
    fakeDb.respond('INSERT INTO community_messages', [{ id: 8 }]);
    fakeDb.respond('MAX(display_order)', [{ next_order: 0 }]);
  });

  it('classifies attachments by mime type', async () => {
    await createMessage(2, { content: 'Harvest photos', tags: ['maize'] }, [
      { path: 'communityfiles/a.png', originalName: 'a.png', mimeType: 'image/png', size: 10 },
      { path: 'communityfiles/b.pdf', originalName: 'b.pdf', mimeType: 'application/pdf', size: 20 },
    ]);

    expect(fakeDb.find('INSERT INTO community_messages')[0].params).toEqual([
      2,
      null,
      'Harvest photos',
      null,
      '["maize"]',
      false,
      false,
    ]);
    expect(fakeDb.find('INSERT INTO message_attachments').map((q) => q.params)).toEqual([
      [8, 'a.png', 'communityfiles/a.png', 'image', 'image/png', 10, 0],
      [8, 'b.pdf', 'communityfiles/b.pdf', 'document', 'application/pdf', 20, 1],
    ]);
  });
});

describe('updateMessage', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('bumps updated_at even without field changes', async () => {
    await updateMessage(message, 2, {}, []);

    const [update] = fakeDb.find('UPDATE community_messages');
    expect(update.text).toContain('SET updated_at = CURRENT_TIMESTAMP');
    expect(update.params).toEqual([8]);
  });
});

describe('softDeleteMessage', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('returns the attachment paths', async () => {
    fakeDb.respond('DELETE FROM message_attachments', [{ file_path: 'communityfiles/a.png' }]);
    await expect(softDeleteMessage(8)).resolves.toEqual(['communityfiles/a.png']);
  });
});
