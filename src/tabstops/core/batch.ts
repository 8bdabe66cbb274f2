/**
 * One-shot elastic tabstop computation.
 *
 * A single forward pass accumulates the maximum width of every run, then
 * a replay pass hands each line the final maxima of the runs it belongs to.
 * The max of a run can still grow after its first lines were seen, so
 * output has to wait for the whole pass.
 */

import type {
  ComputeTabSizesOptions,
  Line,
  SizeFn,
  TabSizes,
  TabSizesFixture,
  TabStops,
} from '../../types/tab-stops.ts';
import { InvalidSizeError } from '../../types/errors.ts';
import { tabStopsFromFixture } from './tab-stops.ts';

// =============================================================================
// Measuring
// =============================================================================

/**
 * Default size function: the length of a string or array cell.
 * A number cell is taken as an already measured size.
 */
export function cellLength(cell: unknown): number {
  if (typeof cell === 'string' || Array.isArray(cell)) return cell.length;
  if (typeof cell === 'number') return cell;
  throw new InvalidSizeError(
    `Cannot measure cell of type ${typeof cell}; pass a size function`
  );
}

/**
 * Number of aligned columns in a line: every cell except the last.
 */
export function columnCount<Cell>(line: Line<Cell>): number {
  return Math.max(0, line.length - 1);
}

/**
 * Policy-applied widths of a line's columns (last cell excluded).
 *
 * @throws InvalidSizeError if `sizeFn` returns a negative or non-finite size
 */
export function measureLine<Cell>(
  line: Line<Cell>,
  tabStops: TabStops,
  sizeFn: SizeFn<Cell>
): number[] {
  const count = columnCount(line);
  const widths: number[] = new Array<number>(count);
  for (let col = 0; col < count; col++) {
    const size = sizeFn(line[col]);
    if (!Number.isFinite(size) || size < 0) {
      throw new InvalidSizeError(`Invalid size ${size} for column ${col}`);
    }
    widths[col] = tabStops.getTabSize(size);
  }
  return widths;
}

// =============================================================================
// Batch Computation
// =============================================================================

/**
 * Consecutive lines with the same column count. No run starts inside a
 * group, so every line of it reads the same run slots.
 */
interface LineGroup {
  readonly firstLine: number;
  readonly columnCount: number;
}

/**
 * Compute the column widths of every line.
 *
 * `startTabSizes` are the widths the run above the first line already
 * agreed on; `endTabSizes` those of the run below the last line. Both are
 * policy-applied widths, not raw sizes, and default to a block boundary.
 *
 * @example
 * ```typescript
 * computeTabSizes([['it', 'is', 'a'], ['small', 'world']], createTabStops());
 * // [[6, 3], [6]]
 * ```
 */
export function computeTabSizes<Cell>(
  lines: readonly Line<Cell>[],
  tabStops: TabStops,
  options: ComputeTabSizesOptions<Cell> = {}
): TabSizes[] {
  const sizeFn: SizeFn<Cell> = options.sizeFn ?? cellLength;
  const startTabSizes = options.startTabSizes ?? [];
  const endTabSizes = options.endTabSizes ?? [];

  // Phase 1: forward pass. One slot per run and column, in creation order.
  const runWidths: number[] = [...startTabSizes];
  const openSlots: number[] = startTabSizes.map((_, col) => col);
  const groups: LineGroup[] = [];

  const fold = (widths: readonly number[]): void => {
    for (let col = 0; col < widths.length; col++) {
      if (col >= openSlots.length) {
        runWidths.push(widths[col]);
        openSlots.push(runWidths.length - 1);
      } else {
        const slot = openSlots[col];
        runWidths[slot] = Math.max(runWidths[slot], widths[col]);
      }
    }
  };

  for (let lineNo = 0; lineNo < lines.length; lineNo++) {
    const widths = measureLine(lines[lineNo], tabStops, sizeFn);
    fold(widths);

    // A shorter line closes the runs of the columns it lacks
    openSlots.length = widths.length;

    const previous = groups[groups.length - 1];
    if (previous === undefined || previous.columnCount !== widths.length) {
      groups.push({ firstLine: lineNo, columnCount: widths.length });
    }
  }

  fold(endTabSizes);

  // Phase 2: replay the groups, allocating slots in the same order.
  const result: TabSizes[] = [];
  const slots: number[] = startTabSizes.map((_, col) => col);
  let nextSlot = startTabSizes.length;

  for (let g = 0; g < groups.length; g++) {
    const { firstLine, columnCount: count } = groups[g];
    const endLine = g + 1 < groups.length ? groups[g + 1].firstLine : lines.length;

    while (slots.length < count) {
      slots.push(nextSlot++);
    }
    slots.length = count;

    const widths = slots.map(slot => runWidths[slot]);
    for (let lineNo = firstLine; lineNo < endLine; lineNo++) {
      result.push(widths.slice());
    }
  }

  return result;
}

/**
 * Run a golden fixture through the batch computation.
 * `params.startLineNo`/`endLineNo` select the window of `textBlock` to compute.
 */
export function computeFixture(fixture: TabSizesFixture): TabSizes[] {
  const params = fixture.params ?? {};
  const lines = fixture.textBlock.slice(
    params.startLineNo ?? 0,
    params.endLineNo ?? fixture.textBlock.length
  );

  return computeTabSizes(lines, tabStopsFromFixture(fixture.tabStops), {
    startTabSizes: params.startTabSizes,
    endTabSizes: params.endTabSizes,
  });
}
