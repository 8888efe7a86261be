export interface TreeRow {
  id: number;
  parentId: number | null;
}

export type TreeNode<T> = T & { depth: number; children: TreeNode<T>[] };

/**
 * Nests flat rows by their parent pointer. Rows whose parent is not in the
 * list are treated as roots; input order is kept among siblings.
 */
export const buildTree = <T>(rows: T[], key: (row: T) => TreeRow): TreeNode<T>[] => {
  const nodes = new Map<number, TreeNode<T>>();
  for (const row of rows) {
    nodes.set(key(row).id, { ...row, depth: 0, children: [] });
  }

  const roots: TreeNode<T>[] = [];
  for (const row of rows) {
    const { id, parentId } = key(row);
    const node = nodes.get(id);
    if (!node) continue;
    const parent = parentId === null ? undefined : nodes.get(parentId);
    if (parent && parent !== node) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
  }

  const assignDepth = (list: TreeNode<T>[], depth: number, seen: Set<TreeNode<T>>) => {
    for (const node of list) {
      if (seen.has(node)) continue;
      seen.add(node);
      node.depth = depth;
      assignDepth(node.children, depth + 1, seen);
    }
  };
  assignDepth(roots, 0, new Set());

  return roots;
};

/**
 * Ids of every row below `rootId`, breadth first.
 */
export const collectDescendantIds = (rootId: number, rows: TreeRow[]): number[] => {
  const childrenOf = new Map<number, number[]>();
  for (const { id, parentId } of rows) {
    if (parentId === null) continue;
    const siblings = childrenOf.get(parentId) ?? [];
    siblings.push(id);
    childrenOf.set(parentId, siblings);
  }

  const result: number[] = [];
  const queue = [...(childrenOf.get(rootId) ?? [])];
  const seen = new Set<number>([rootId]);
  while (queue.length > 0) {
    const next = queue.shift();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    result.push(next);
    queue.push(...(childrenOf.get(next) ?? []));
  }
  return result;
};
