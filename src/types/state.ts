/**
 * Immutable tree node types backing the column width multiset.
 * Nodes are frozen and shared between successive tree versions.
 */

// =============================================================================
// Red-Black Tree Types
// =============================================================================

/**
 * Red-Black tree node color.
 */
export type NodeColor = 'red' | 'black';

/**
 * Generic base interface for Red-Black tree nodes.
 * Uses F-bounded polymorphism for type-safe self-referential children.
 *
 * @template T - The concrete node type extending this interface
 */
export interface RBNode<T extends RBNode<T>> {
  readonly color: NodeColor;
  readonly left: T | null;
  readonly right: T | null;
}

// =============================================================================
// Width Multiset Types
// =============================================================================

/**
 * One distinct width in the multiset tree.
 * Duplicates are folded into `count` instead of separate nodes.
 */
export interface WidthNode extends RBNode<WidthNode> {
  /** Width value (ordering key) */
  readonly value: number;
  /** Occurrences of `value` (always >= 1) */
  readonly count: number;
  /** Total occurrences in this subtree (for O(1) size) */
  readonly subtreeCount: number;
}

/**
 * Fields of a WidthNode that may be replaced when deriving a new node.
 */
export type WidthNodeUpdates = Partial<Pick<WidthNode, 'color' | 'left' | 'right' | 'value' | 'count'>>;
