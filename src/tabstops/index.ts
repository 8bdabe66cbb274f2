/**
 * Library exports for elastic tabstop computation.
 */

// Tab stop policy
export {
  DEFAULT_TAB_STOPS,
  createTabStops,
  validateTabStopsConfig,
  tabStopsFromFixture,
} from './core/tab-stops.ts';

// Width multiset and its tree
export {
  ColumnWidthMultiset,
  createWidthNode,
  withWidthNode,
  findWidthNode,
} from './core/width-multiset.ts';
export type { ReadonlyColumnWidthMultiset } from './core/width-multiset.ts';
export { blackHeight, isRed, isBlack } from './core/rb-tree.ts';
export type { WithNodeFn } from './core/rb-tree.ts';

// Batch computation
export {
  computeTabSizes,
  computeFixture,
  measureLine,
  columnCount,
  cellLength,
} from './core/batch.ts';

// Incremental text block
export { TextBlock } from './features/text-block.ts';

// Event system
export {
  createTextBlockEventEmitter,
  createEditEvent,
  createReverseEvent,
} from './features/events.ts';
export type {
  TextBlockEvent,
  EditEvent,
  ReverseEvent,
  TextBlockEventMap,
  EventHandler,
  Unsubscribe,
  TextBlockEventEmitter,
} from './features/events.ts';

// Text helpers
export { splitCells, splitLines, tabStopPositions } from './features/cells.ts';
