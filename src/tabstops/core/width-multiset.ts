/**
 * Column width multiset: the width tracker shared by every line of a run.
 *
 * Backed by an immutable left-leaning Red-Black tree keyed by distinct
 * width, with duplicates folded into a per-node count. Insert, exact-value
 * removal and max are all O(log n); removing a non-maximal value never
 * leaves a stale maximum behind.
 */

import type { WidthNode, WidthNodeUpdates, NodeColor } from '../../types/state.ts';
import { InternalConsistencyError } from '../../types/errors.ts';
import {
  balance,
  blackHeight,
  ensureBlackRoot,
  isRed,
  maxNode,
  minNode,
  moveRedLeft,
  moveRedRight,
  rotateRight,
  type WithNodeFn,
} from './rb-tree.ts';

// =============================================================================
// Node Factories
// =============================================================================

/**
 * Create a new width node. New nodes are red so that inserts
 * never change black height.
 */
export function createWidthNode(
  value: number,
  count: number = 1,
  color: NodeColor = 'red',
  left: WidthNode | null = null,
  right: WidthNode | null = null
): WidthNode {
  const leftCount = left?.subtreeCount ?? 0;
  const rightCount = right?.subtreeCount ?? 0;

  return Object.freeze({
    color,
    left,
    right,
    value,
    count,
    subtreeCount: count + leftCount + rightCount,
  });
}

/**
 * Derive a node with some fields replaced.
 * subtreeCount is always recomputed from the resulting children.
 */
export function withWidthNode(node: WidthNode, changes: WidthNodeUpdates): WidthNode {
  return createWidthNode(
    changes.value ?? node.value,
    changes.count ?? node.count,
    changes.color ?? node.color,
    changes.left !== undefined ? changes.left : node.left,
    changes.right !== undefined ? changes.right : node.right
  );
}

const withWidth: WithNodeFn<WidthNode> = withWidthNode;

// =============================================================================
// Tree Operations
// =============================================================================

/**
 * Find the node holding `value`, or null.
 */
export function findWidthNode(root: WidthNode | null, value: number): WidthNode | null {
  let current = root;
  while (current !== null) {
    if (value < current.value) {
      current = current.left;
    } else if (value > current.value) {
      current = current.right;
    } else {
      return current;
    }
  }
  return null;
}

function insertValue(node: WidthNode | null, value: number): WidthNode {
  if (node === null) return createWidthNode(value);

  if (value === node.value) {
    return withWidthNode(node, { count: node.count + 1 });
  }

  const result = value < node.value
    ? withWidthNode(node, { left: insertValue(node.left, value) })
    : withWidthNode(node, { right: insertValue(node.right, value) });

  return balance(result, withWidth);
}

/**
 * Path-copy down to `value` and lower its count by one.
 * Only valid when that node's count is above 1 (no structural change).
 */
function decrementValue(node: WidthNode, value: number): WidthNode {
  if (value < node.value && node.left !== null) {
    return withWidthNode(node, { left: decrementValue(node.left, value) });
  }
  if (value > node.value && node.right !== null) {
    return withWidthNode(node, { right: decrementValue(node.right, value) });
  }
  return withWidthNode(node, { count: node.count - 1 });
}

function deleteMin(node: WidthNode): WidthNode | null {
  if (node.left === null) return null;

  let h = node;
  if (!isRed(h.left) && !isRed(h.left?.left)) {
    h = moveRedLeft(h, withWidth);
  }

  const left = h.left;
  if (left === null) {
    throw new InternalConsistencyError('Width tree lost its left spine during deletion');
  }
  h = withWidthNode(h, { left: deleteMin(left) });

  return balance(h, withWidth);
}

function deleteValue(node: WidthNode, value: number): WidthNode | null {
  let h = node;

  if (value < h.value) {
    if (!isRed(h.left) && !isRed(h.left?.left)) {
      h = moveRedLeft(h, withWidth);
    }
    const left = h.left;
    if (left === null) {
      throw new InternalConsistencyError(`Width ${value} not found in tree`);
    }
    h = withWidthNode(h, { left: deleteValue(left, value) });
  } else {
    if (isRed(h.left)) {
      h = rotateRight(h, withWidth);
    }
    if (value === h.value && h.right === null) {
      return null;
    }
    if (!isRed(h.right) && !isRed(h.right?.left)) {
      h = moveRedRight(h, withWidth);
    }
    const right = h.right;
    if (right === null) {
      throw new InternalConsistencyError(`Width ${value} not found in tree`);
    }
    if (value === h.value) {
      // Replace this node with its in-order successor
      const successor = minNode(right);
      h = withWidthNode(h, {
        value: successor.value,
        count: successor.count,
        right: deleteMin(right),
      });
    } else {
      h = withWidthNode(h, { right: deleteValue(right, value) });
    }
  }

  return balance(h, withWidth);
}

function collectValues(node: WidthNode | null, out: number[]): void {
  if (node === null) return;
  collectValues(node.left, out);
  for (let i = 0; i < node.count; i++) out.push(node.value);
  collectValues(node.right, out);
}

// =============================================================================
// Multiset
// =============================================================================

let nextMultisetId = 0;

/**
 * Mutable multiset of column widths.
 *
 * Each instance belongs to exactly one (run, column) pair and is aliased by
 * every line in that run. The tree behind it is immutable; the instance
 * swaps its root on every mutation.
 */
export class ColumnWidthMultiset {
  /** Stable identity for diagnostics */
  readonly id: number;
  private root: WidthNode | null = null;

  constructor(values: Iterable<number> = []) {
    this.id = nextMultisetId++;
    for (const value of values) {
      this.insert(value);
    }
  }

  /**
   * Number of contributions, duplicates included.
   */
  get size(): number {
    return this.root?.subtreeCount ?? 0;
  }

  isEmpty(): boolean {
    return this.root === null;
  }

  /**
   * Add one occurrence of `value`.
   */
  insert(value: number): void {
    this.root = ensureBlackRoot(insertValue(this.root, value), withWidth);
  }

  /**
   * Remove one occurrence of `value`.
   *
   * @throws InternalConsistencyError if `value` is not present
   */
  remove(value: number): void {
    const node = findWidthNode(this.root, value);
    if (this.root === null || node === null) {
      throw new InternalConsistencyError(
        `Cannot remove width ${value}: not present in multiset #${this.id}`
      );
    }

    if (node.count > 1) {
      this.root = decrementValue(this.root, value);
      return;
    }

    let root = this.root;
    if (!isRed(root.left) && !isRed(root.right)) {
      root = withWidthNode(root, { color: 'red' });
    }
    const next = deleteValue(root, value);
    this.root = next === null ? null : ensureBlackRoot(next, withWidth);
  }

  /**
   * Largest value present.
   *
   * @throws InternalConsistencyError if the multiset is empty
   */
  max(): number {
    if (this.root === null) {
      throw new InternalConsistencyError(`Cannot take max of empty multiset #${this.id}`);
    }
    return maxNode(this.root).value;
  }

  /**
   * Smallest value present.
   *
   * @throws InternalConsistencyError if the multiset is empty
   */
  min(): number {
    if (this.root === null) {
      throw new InternalConsistencyError(`Cannot take min of empty multiset #${this.id}`);
    }
    return minNode(this.root).value;
  }

  /**
   * Occurrences of `value`.
   */
  count(value: number): number {
    return findWidthNode(this.root, value)?.count ?? 0;
  }

  has(value: number): boolean {
    return findWidthNode(this.root, value) !== null;
  }

  /**
   * All contributions in ascending order, duplicates repeated.
   */
  values(): number[] {
    const out: number[] = [];
    collectValues(this.root, out);
    return out;
  }

  /**
   * True when the backing tree satisfies every Red-Black invariant.
   */
  isBalanced(): boolean {
    return !isRed(this.root) && blackHeight(this.root) >= 0;
  }
}

/**
 * Read-only view of a multiset, handed out to callers that inspect a
 * block's width trackers without owning them.
 */
export type ReadonlyColumnWidthMultiset = Pick<
  ColumnWidthMultiset,
  'id' | 'size' | 'isEmpty' | 'max' | 'min' | 'count' | 'has' | 'values' | 'isBalanced'
>;
