import { describe, it, expect } from 'vitest';
import { buildTree, collectDescendantIds } from './tree';

interface Row {
  id: number;
  parent_id: number | null;
  text: string;
}

const key = (row: Row) => ({ id: row.id, parentId: row.parent_id });

describe('buildTree', () => {
  it('nests rows under their parents with depth', () => {
    const rows: Row[] = [
      { id: 1, parent_id: null, text: 'a' },
      { id: 2, parent_id: 1, text: 'b' },
      { id: 3, parent_id: 2, text: 'c' },
      { id: 4, parent_id: null, text: 'd' },
    ];

    const tree = buildTree(rows, key);

    expect(tree.map((node) => node.id)).toEqual([1, 4]);
    expect(tree[0].children[0].id).toBe(2);
    expect(tree[0].children[0].depth).toBe(1);
    expect(tree[0].children[0].children[0].text).toBe('c');
    expect(tree[0].children[0].children[0].depth).toBe(2);
    expect(tree[1].children).toEqual([]);
  });

  it('keeps sibling order', () => {
    const rows: Row[] = [
      { id: 1, parent_id: null, text: 'root' },
      { id: 5, parent_id: 1, text: 'first' },
      { id: 3, parent_id: 1, text: 'second' },
    ];
    expect(buildTree(rows, key)[0].children.map((node) => node.text)).toEqual(['first', 'second']);
  });

  it('treats rows with a missing parent as roots', () => {
    const rows: Row[] = [{ id: 7, parent_id: 99, text: 'orphan' }];
    const tree = buildTree(rows, key);
    expect(tree).toHaveLength(1);
    expect(tree[0].depth).toBe(0);
  });
});

describe('collectDescendantIds', () => {
  it('returns every id below the root breadth first', () => {
    const rows = [
      { id: 1, parentId: null },
      { id: 2, parentId: 1 },
      { id: 3, parentId: 1 },
      { id: 4, parentId: 2 },
      { id: 5, parentId: null },
    ];
    expect(collectDescendantIds(1, rows)).toEqual([2, 3, 4]);
    expect(collectDescendantIds(5, rows)).toEqual([]);
  });
});
