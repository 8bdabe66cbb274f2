/**
 * Elastic Tabstops - incremental column width computation for text editors
 *
 * Main entry point exporting core types, the batch computation and the
 * incremental text block.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  TabStopsConfig,
  TabStops,
  TabStopsValidationResult,
  SizeFn,
  Line,
  TabSizes,
  ComputeTabSizesOptions,
  EditResult,
  FixtureTabStops,
  FixtureParams,
  TabSizesFixture,
  NodeColor,
  RBNode,
  WidthNode,
  WidthNodeUpdates,
} from './types/index.ts';

// =============================================================================
// Errors
// =============================================================================

export {
  TabStopsError,
  ConfigurationError,
  LineRangeError,
  LineNotFoundError,
  InternalConsistencyError,
  InvalidSizeError,
} from './types/index.ts';

// =============================================================================
// Tab Stop Policy
// =============================================================================

export {
  DEFAULT_TAB_STOPS,
  createTabStops,
  validateTabStopsConfig,
  tabStopsFromFixture,
} from './tabstops/index.ts';

// =============================================================================
// Width Multiset
// =============================================================================

export {
  ColumnWidthMultiset,
  createWidthNode,
  withWidthNode,
  findWidthNode,
  blackHeight,
  isRed,
  isBlack,
} from './tabstops/index.ts';
export type { ReadonlyColumnWidthMultiset, WithNodeFn } from './tabstops/index.ts';

// =============================================================================
// Batch Computation
// =============================================================================

export {
  computeTabSizes,
  computeFixture,
  measureLine,
  columnCount,
  cellLength,
} from './tabstops/index.ts';

// =============================================================================
// Incremental Text Block
// =============================================================================

export { TextBlock } from './tabstops/index.ts';

// =============================================================================
// Event System
// =============================================================================

export {
  createTextBlockEventEmitter,
  createEditEvent,
  createReverseEvent,
} from './tabstops/index.ts';
export type {
  TextBlockEvent,
  EditEvent,
  ReverseEvent,
  TextBlockEventMap,
  EventHandler,
  Unsubscribe,
  TextBlockEventEmitter,
} from './tabstops/index.ts';

// =============================================================================
// Text Helpers
// =============================================================================

export { splitCells, splitLines, tabStopPositions } from './tabstops/index.ts';
