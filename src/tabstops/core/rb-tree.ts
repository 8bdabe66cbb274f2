/**
 * Generic left-leaning Red-Black tree utilities.
 * Provides immutable balancing operations for any R-B tree node type:
 * every helper returns new nodes and never mutates its input.
 */

import type { NodeColor, RBNode } from '../../types/state.ts';

// Re-export RBNode for consumers that import from rb-tree
export type { RBNode };

// =============================================================================
// Types
// =============================================================================

/**
 * Function type for creating a new node with updated properties.
 * Each concrete node type provides its own implementation that handles
 * recalculating aggregate values (subtreeCount, etc).
 */
export type WithNodeFn<N extends RBNode<N>> = (
  node: N,
  updates: Partial<{ color: NodeColor; left: N | null; right: N | null }>
) => N;

// =============================================================================
// Color Utilities
// =============================================================================

/**
 * Check if a node is red.
 * Returns false for null/undefined nodes (they're treated as black).
 */
export function isRed<N extends RBNode<N>>(node: N | null | undefined): boolean {
  return node != null && node.color === 'red';
}

/**
 * Check if a node is black.
 * Null nodes are considered black.
 */
export function isBlack<N extends RBNode<N>>(node: N | null | undefined): boolean {
  return node == null || node.color === 'black';
}

function opposite(color: NodeColor): NodeColor {
  return color === 'red' ? 'black' : 'red';
}

// =============================================================================
// Rotations
// =============================================================================

/**
 * Rotate left at the given node. Returns the new subtree root.
 * The new root takes the old root's color; the old root becomes red.
 *
 *       x                y
 *      / \              / \
 *     a   y    =>      x   c
 *        / \          / \
 *       b   c        a   b
 */
export function rotateLeft<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  const right = node.right;
  if (right === null) return node;

  const newNode = withNode(node, {
    right: right.left,
    color: 'red',
  });

  return withNode(right, {
    left: newNode,
    color: node.color,
  });
}

/**
 * Rotate right at the given node. Returns the new subtree root.
 * The new root takes the old root's color; the old root becomes red.
 *
 *         y            x
 *        / \          / \
 *       x   c   =>   a   y
 *      / \              / \
 *     a   b            b   c
 */
export function rotateRight<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  const left = node.left;
  if (left === null) return node;

  const newNode = withNode(node, {
    left: left.right,
    color: 'red',
  });

  return withNode(left, {
    right: newNode,
    color: node.color,
  });
}

// =============================================================================
// Balancing
// =============================================================================

/**
 * Invert the color of a node and both of its children.
 */
export function flipColors<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  const left = node.left;
  const right = node.right;
  return withNode(node, {
    color: opposite(node.color),
    left: left ? withNode(left, { color: opposite(left.color) }) : null,
    right: right ? withNode(right, { color: opposite(right.color) }) : null,
  });
}

/**
 * Make node.left or one of its children red, borrowing from the right
 * sibling when possible. Used on the way down a deletion to the left.
 */
export function moveRedLeft<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  let result = flipColors(node, withNode);
  if (result.right !== null && isRed(result.right.left)) {
    result = withNode(result, { right: rotateRight(result.right, withNode) });
    result = rotateLeft(result, withNode);
    result = flipColors(result, withNode);
  }
  return result;
}

/**
 * Make node.right or one of its children red.
 * Used on the way down a deletion to the right.
 */
export function moveRedRight<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  let result = flipColors(node, withNode);
  if (result.left !== null && isRed(result.left.left)) {
    result = rotateRight(result, withNode);
    result = flipColors(result, withNode);
  }
  return result;
}

/**
 * Restore the left-leaning invariants at a node on the way back up
 * from an insert or delete.
 */
export function balance<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  let result = node;

  // Right-leaning red link: lean it left
  if (isRed(result.right) && !isRed(result.left)) {
    result = rotateLeft(result, withNode);
  }
  // Two reds in a row on the left
  if (isRed(result.left) && isRed(result.left?.left)) {
    result = rotateRight(result, withNode);
  }
  // Temporary 4-node: split it
  if (isRed(result.left) && isRed(result.right)) {
    result = flipColors(result, withNode);
  }

  return result;
}

/**
 * Ensure the root is black.
 */
export function ensureBlackRoot<N extends RBNode<N>>(
  node: N,
  withNode: WithNodeFn<N>
): N {
  if (node.color === 'red') {
    return withNode(node, { color: 'black' });
  }
  return node;
}

/**
 * Return the leftmost node of a subtree.
 */
export function minNode<N extends RBNode<N>>(node: N): N {
  let current = node;
  while (current.left !== null) {
    current = current.left;
  }
  return current;
}

/**
 * Return the rightmost node of a subtree.
 */
export function maxNode<N extends RBNode<N>>(node: N): N {
  let current = node;
  while (current.right !== null) {
    current = current.right;
  }
  return current;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Black height of a subtree, or -1 when the Red-Black invariants are broken
 * (unequal black heights, a red right link, or two reds in a row).
 */
export function blackHeight<N extends RBNode<N>>(node: N | null): number {
  if (node === null) return 0;
  if (isRed(node.right)) return -1;
  if (isRed(node) && isRed(node.left)) return -1;

  const left = blackHeight(node.left);
  const right = blackHeight(node.right);
  if (left < 0 || right < 0 || left !== right) return -1;

  return left + (isBlack(node) ? 1 : 0);
}
