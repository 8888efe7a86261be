import { vi } from 'vitest';

export interface RecordedQuery {
  text: string;
  params: unknown[];
}

type Rows = unknown[] | ((params: unknown[]) => unknown[]);

interface Responder {
  match: string | RegExp;
  rows: Rows;
}

const matches = (match: string | RegExp, text: string) =>
  typeof match === 'string' ? text.includes(match) : match.test(text);

/**
 * In-process stand-in for the pg pool and `withTransaction`. Queries are
 * recorded; rows come from the first responder whose pattern matches.
 */
const createFakeDb = () => {
  const queries: RecordedQuery[] = [];
  let responders: Responder[] = [];

  const query = vi.fn(async (text: string, params: unknown[] = []) => {
    queries.push({ text, params });
    const responder = responders.find((candidate) => matches(candidate.match, text));
    const rows = !responder ? [] : typeof responder.rows === 'function' ? responder.rows(params) : responder.rows;
    return { rows, rowCount: rows.length };
  });

  const client = { query, release: vi.fn() };

  return {
    queries,
    pool: { query },
    client,

    respond(match: string | RegExp, rows: Rows) {
      responders.push({ match, rows });
    },

    async withTransaction<T>(work: (tx: typeof client) => Promise<T>): Promise<T> {
      queries.push({ text: 'BEGIN', params: [] });
      try {
        const result = await work(client);
        queries.push({ text: 'COMMIT', params: [] });
        return result;
      } catch (error) {
        queries.push({ text: 'ROLLBACK', params: [] });
        throw error;
      }
    },

    // statements containing `fragment`, in order
    find(fragment: string): RecordedQuery[] {
      return queries.filter((q) => q.text.includes(fragment));
    },

    reset() {
      queries.length = 0;
      responders = [];
      query.mockClear();
    },
  };
};

export const fakeDb = createFakeDb();

export const connectionsMock = () => ({
  pool: fakeDb.pool,
  withTransaction: <T>(work: (tx: typeof fakeDb.client) => Promise<T>) => fakeDb.withTransaction(work),
});
