/**
 * Core types for elastic tabstop computation.
 * Sizes and widths are expressed in caller-defined "view units"
 * (characters for a terminal, pixels for a measured font).
 */

// =============================================================================
// Tab Stop Policy Types
// =============================================================================

/**
 * Configuration of how a raw cell size becomes a column width.
 */
export interface TabStopsConfig {
  /** Extra space between columns, in view units (default: 1) */
  readonly margin: number;
  /** Minimum column width excluding margin, in view units (default: 1) */
  readonly minSize: number;
  /** Alignment step of tab stops, in view units (default: 1, must be > 0) */
  readonly stepSize: number;
}

/**
 * Resolved tab stop policy.
 * `getTabSize` is pure and total over non-negative sizes.
 */
export interface TabStops extends TabStopsConfig {
  getTabSize(size: number): number;
}

/**
 * Result of validating an untrusted tab stop configuration.
 */
export interface TabStopsValidationResult {
  readonly valid: boolean;
  readonly errors: readonly string[];
}

// =============================================================================
// Line Types
// =============================================================================

/**
 * Measures a cell's rendered size. Must return a number >= 0.
 * The engine never looks inside a cell; this is the only way it learns sizes.
 */
export type SizeFn<Cell> = (cell: Cell) => number;

/**
 * A line is an ordered sequence of cells. The last cell never takes part
 * in alignment, so a line of n cells has max(0, n - 1) columns.
 */
export type Line<Cell> = readonly Cell[];

/**
 * Column widths of one line, one entry per column (last cell excluded).
 */
export type TabSizes = number[];

/**
 * Options for the one-shot width computation.
 */
export interface ComputeTabSizesOptions<Cell> {
  /** Cell measuring function (default: length of the cell) */
  readonly sizeFn?: SizeFn<Cell>;
  /** Widths the run above the first line already agreed on (policy-applied) */
  readonly startTabSizes?: readonly number[];
  /** Widths of the run below the last line (policy-applied) */
  readonly endTabSizes?: readonly number[];
}

// =============================================================================
// Text Block Types
// =============================================================================

/**
 * Summary of one `TextBlock.edit` call.
 */
export interface EditResult {
  /** First line index touched (resolved, non-negative) */
  readonly start: number;
  /** Number of lines removed at `start` */
  readonly deleteCount: number;
  /** Number of lines inserted at `start` */
  readonly insertCount: number;
  /**
   * End (exclusive) of the lines whose width trackers were assigned or
   * re-pointed. Always >= start + insertCount.
   */
  readonly reconciledEnd: number;
}

// =============================================================================
// Fixture Types
// =============================================================================

/**
 * Tab stop settings as spelled in golden fixtures.
 * `minLength` is the older spelling of `minSize`.
 */
export interface FixtureTabStops {
  readonly margin?: number;
  readonly minSize?: number;
  readonly minLength?: number;
  readonly stepSize?: number;
}

/**
 * Computation window and boundary hints of a golden fixture.
 */
export interface FixtureParams {
  readonly startLineNo?: number;
  readonly endLineNo?: number;
  readonly startTabSizes?: readonly number[];
  readonly endTabSizes?: readonly number[];
}

/**
 * Golden conformance fixture: a block of text cells and the expected widths.
 */
export interface TabSizesFixture {
  readonly textBlock: readonly (readonly string[])[];
  readonly tabStops?: FixtureTabStops;
  readonly params?: FixtureParams;
  readonly tabSizes: readonly (readonly number[])[];
}
