import { describe, it, expect, beforeEach, vi } from 'vitest';
import { fakeDb } from '../../test/mocks/fakeDb';
import { mockRequest, mockResponse } from '../../test/mocks/mockExpress';

vi.mock('../../connections', async () => (await import('../../test/mocks/fakeDb')).connectionsMock());

import { createCategory, deleteCategory, updateCategory } from './categories.controller';

const vegetables = { id: 2, name: 'Vegetables', description: null };

beforeEach(() => {
  fakeDb.reset();
});

describe('createCategory', () => {
  it('requires a name', async () => {
    const { res, statusCode } = mockResponse();

    await createCategory(mockRequest({ method: 'POST', body: { name: '  ' } }), res);

    expect(statusCode()).toBe(422);
    expect(fakeDb.queries).toHaveLength(0);
  });

  it('stores a missing description as NULL', async () => {
    fakeDb.respond('INSERT INTO categories', [vegetables]);
    const { res, statusCode, body } = mockResponse();

    await createCategory(mockRequest({ method: 'POST', body: { name: 'Vegetables' } }), res);

    expect(statusCode()).toBe(201);
    expect(fakeDb.queries[0].params).toEqual(['Vegetables', null]);
    expect(body()).toMatchObject({ data: { category: vegetables } });
  });
});

describe('updateCategory', () => {
  it('clears the description only when one is sent', async () => {
    fakeDb.respond('UPDATE categories', [vegetables]);
    const { res } = mockResponse();

    await updateCategory(mockRequest({ method: 'PUT', params: { id: '2' }, body: { name: 'Greens' } }), res);
    await updateCategory(mockRequest({ method: 'PUT', params: { id: '2' }, body: { description: null } }), res);

    const [rename, clear] = fakeDb.find('UPDATE categories');
    expect(rename.params).toEqual(['Greens', false, null, 2]);
    expect(clear.params).toEqual([null, true, null, 2]);
  });

  it('answers 404 for an unknown id', async () => {
    const { res, statusCode } = mockResponse();

    await updateCategory(mockRequest({ method: 'PUT', params: { id: '40' }, body: { name: 'Greens' } }), res);

    expect(statusCode()).toBe(404);
  });
});

describe('deleteCategory', () => {
  it('answers 404 without querying for a malformed id', async () => {
    const { res, statusCode } = mockResponse();

    await deleteCategory(mockRequest({ method: 'DELETE', params: { id: 'abc' } }), res);

    expect(statusCode()).toBe(404);
    expect(fakeDb.queries).toHaveLength(0);
  });

  it('deletes an existing category', async () => {
    fakeDb.respond('DELETE FROM categories', [{ id: 2 }]);
    const { res, statusCode, body } = mockResponse();

    await deleteCategory(mockRequest({ method: 'DELETE', params: { id: '2' } }), res);

    expect(statusCode()).toBe(200);
    expect(body()).toMatchObject({ success: true, message: 'Category deleted successfully' });
  });
});
