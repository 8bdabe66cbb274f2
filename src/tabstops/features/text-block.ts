/**
 * Incremental elastic tabstops over a mutable block of lines.
 *
 * Every line holds, per column, a reference to the ColumnWidthMultiset of
 * the run it belongs to. A run for column c is a maximal span of
 * consecutive lines that all have more than c columns; all of its lines
 * share one multiset, and the width reported for the column is that
 * multiset's maximum. Run boundaries are never stored: two neighbouring
 * lines are in the same run exactly when they reference the same multiset.
 *
 * `edit` is the only mutation. It touches the edited lines, then walks the
 * following lines only as long as their references have to move.
 */

import type { EditResult, Line, SizeFn, TabSizes, TabStops } from '../../types/tab-stops.ts';
import { LineNotFoundError, LineRangeError } from '../../types/errors.ts';
import { createTabStops } from '../core/tab-stops.ts';
import { cellLength, measureLine } from '../core/batch.ts';
import {
  ColumnWidthMultiset,
  type ReadonlyColumnWidthMultiset,
} from '../core/width-multiset.ts';
import {
  createEditEvent,
  createReverseEvent,
  createTextBlockEventEmitter,
  type EventHandler,
  type TextBlockEventMap,
  type Unsubscribe,
} from './events.ts';

// =============================================================================
// Types
// =============================================================================

/**
 * A line together with its width bookkeeping.
 * `widths[c]` is what this line contributed to `trackers[c]`; it is kept so
 * that removal takes out exactly the value that went in.
 */
interface LineEntry<Cell> {
  readonly cells: Line<Cell>;
  readonly widths: readonly number[];
  readonly trackers: ColumnWidthMultiset[];
}

/**
 * Maximum of each touched tracker before the edit (null for new trackers).
 */
type TouchedTrackers = Map<ColumnWidthMultiset, number | null>;

/**
 * Above this many items, splice by concatenation instead of spreading
 * arguments, which would overflow the call stack on very large inserts.
 */
const SPREAD_LIMIT = 8192;

function spliceEntries<T>(target: T[], start: number, deleteCount: number, items: readonly T[]): T[] {
  if (items.length < SPREAD_LIMIT) {
    target.splice(start, deleteCount, ...items);
    return target;
  }
  return target.slice(0, start).concat(items, target.slice(start + deleteCount));
}

function sameCells<Cell>(a: Line<Cell>, b: Line<Cell>): boolean {
  return a.length === b.length && a.every((cell, i) => cell === b[i]);
}

function touch(touched: TouchedTrackers, tracker: ColumnWidthMultiset): void {
  if (!touched.has(tracker)) {
    touched.set(tracker, tracker.isEmpty() ? null : tracker.max());
  }
}

// =============================================================================
// Text Block
// =============================================================================

/**
 * A block of lines with incrementally maintained column widths.
 *
 * @example
 * ```typescript
 * const block = new TextBlock([['it', 'is', 'a'], ['small', 'world']]);
 * block.widths();        // [[6, 3], [6]]
 * block.insert(1, []);
 * block.widths();        // [[3, 3], [], [6]]
 * ```
 */
export class TextBlock<Cell = string> {
  readonly tabStops: TabStops;
  private readonly sizeFn: SizeFn<Cell>;
  private readonly events = createTextBlockEventEmitter();
  private entries: LineEntry<Cell>[] = [];

  constructor(
    lines: Iterable<Line<Cell>> = [],
    tabStops: TabStops = createTabStops(),
    sizeFn: SizeFn<Cell> = cellLength
  ) {
    this.tabStops = tabStops;
    this.sizeFn = sizeFn;
    this.edit(0, 0, [...lines]);
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get length(): number {
    return this.entries.length;
  }

  /**
   * Cells of one line. Only indices in [0, length) are accepted.
   */
  line(index: number): Line<Cell> {
    const length = this.entries.length;
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new LineRangeError(index, index + 1, length, `Line ${index} out of range for block of length ${length}`);
    }
    return this.entries[index].cells;
  }

  /**
   * Cells of the lines in [start, end).
   */
  lines(start: number = 0, end: number = this.entries.length): Line<Cell>[] {
    const [from, to] = this.resolveRange(start, end);
    return this.entries.slice(from, to).map(entry => entry.cells);
  }

  /**
   * Index of the first line whose cells equal `line` cell by cell, or -1.
   */
  indexOf(line: Line<Cell>, fromIndex: number = 0): number {
    for (let i = Math.max(0, fromIndex); i < this.entries.length; i++) {
      if (sameCells(this.entries[i].cells, line)) return i;
    }
    return -1;
  }

  /**
   * Number of lines whose cells equal `line`.
   */
  count(line: Line<Cell>): number {
    let total = 0;
    for (const entry of this.entries) {
      if (sameCells(entry.cells, line)) total++;
    }
    return total;
  }

  /**
   * Column widths of the lines in [start, end), last cell excluded.
   */
  widths(start: number = 0, end: number = this.entries.length): TabSizes[] {
    const [from, to] = this.resolveRange(start, end);
    const result: TabSizes[] = [];
    for (let i = from; i < to; i++) {
      result.push(this.entries[i].trackers.map(tracker => tracker.max()));
    }
    return result;
  }

  /**
   * Width of a single column of a single line.
   */
  tabSize(line: number, column: number): number {
    return this.trackerAt(line, column).max();
  }

  /**
   * The width tracker shared by the run containing (line, column).
   */
  widthTracker(line: number, column: number): ReadonlyColumnWidthMultiset {
    return this.trackerAt(line, column);
  }

  /**
   * Lines [start, end) of the run containing (line, column).
   * Walks the run, so costs its length.
   */
  runExtent(line: number, column: number): [number, number] {
    const index = this.resolveIndex(line);
    const tracker = this.trackerAt(index, column);
    return this.extentOf(index, column, tracker);
  }

  // ---------------------------------------------------------------------------
  // Edit
  // ---------------------------------------------------------------------------

  /**
   * Replace lines [start, end) with `newLines`.
   *
   * Negative indices are resolved against the current length. The new lines
   * are measured before anything changes, so a range error or a throwing
   * size function leaves the block exactly as it was.
   *
   * @throws LineRangeError if the resolved range is inverted or out of bounds
   * @throws InvalidSizeError if a new cell measures negative or non-finite
   */
  edit(start: number, end: number, newLines: readonly Line<Cell>[]): EditResult {
    const [from, to] = this.resolveRange(start, end);
    const measured = newLines.map(line => measureLine(line, this.tabStops, this.sizeFn));
    const touched: TouchedTrackers = new Map();

    // Take the removed lines out of their runs
    for (let i = from; i < to; i++) {
      const entry = this.entries[i];
      for (let col = 0; col < entry.trackers.length; col++) {
        touch(touched, entry.trackers[col]);
        entry.trackers[col].remove(entry.widths[col]);
      }
    }

    const inserted: LineEntry<Cell>[] = newLines.map((cells, i) => ({
      cells,
      widths: measured[i],
      trackers: [],
    }));
    this.entries = spliceEntries(this.entries, from, to - from, inserted);

    // Forward pass: new lines join the runs open above them
    const above = from > 0 ? this.entries[from - 1].trackers : [];
    const carried = above.slice();

    for (const entry of inserted) {
      for (let col = 0; col < entry.widths.length; col++) {
        if (col < carried.length) {
          touch(touched, carried[col]);
          carried[col].insert(entry.widths[col]);
        } else {
          const tracker = new ColumnWidthMultiset([entry.widths[col]]);
          touched.set(tracker, null);
          carried.push(tracker);
        }
        entry.trackers.push(carried[col]);
      }
      carried.length = entry.widths.length;
    }

    const reconciledEnd = this.reconcile(from + inserted.length, above, carried, touched);

    const result: EditResult = {
      start: from,
      deleteCount: to - from,
      insertCount: inserted.length,
      reconciledEnd,
    };

    if (this.events.hasListeners('edit')) {
      this.events.emit('edit', createEditEvent(result, this.affectedRange(result, touched)));
    }

    return result;
  }

  /**
   * Re-point following lines onto the runs the edit left open.
   *
   * For each following line and column: a column inside `carried` must share
   * the carried tracker; a column beyond it starts a new run, which needs a
   * fresh tracker only while its old one is still shared with the line above
   * the edit. The walk ends after the first line that needed no change, since
   * every line below it already agrees with it.
   *
   * @returns End (exclusive) of the lines inspected
   */
  private reconcile(
    first: number,
    above: readonly ColumnWidthMultiset[],
    carried: ColumnWidthMultiset[],
    touched: TouchedTrackers
  ): number {
    let line = first;

    while (line < this.entries.length) {
      const entry = this.entries[line];
      let changed = false;

      for (let col = 0; col < entry.trackers.length; col++) {
        const current = entry.trackers[col];
        let target: ColumnWidthMultiset;

        if (col < carried.length) {
          target = carried[col];
        } else if (col < above.length && above[col] === current) {
          // The edit cut this run; split the lower part off
          target = new ColumnWidthMultiset();
          touched.set(target, null);
          carried.push(target);
        } else {
          carried.push(current);
          continue;
        }

        if (target !== current) {
          touch(touched, current);
          touch(touched, target);
          current.remove(entry.widths[col]);
          target.insert(entry.widths[col]);
          entry.trackers[col] = target;
          changed = true;
        }
      }

      carried.length = entry.trackers.length;
      line++;

      if (!changed) break;
    }

    return line;
  }

  /**
   * Lines whose widths may have changed: [start, reconciledEnd) plus the
   * whole run of every surviving tracker whose maximum moved. Each such run
   * reaches into [start - 1, reconciledEnd), so only those lines are scanned
   * for anchors.
   */
  private affectedRange(result: EditResult, touched: TouchedTrackers): [number, number] {
    const changed = new Set<ColumnWidthMultiset>();
    for (const [tracker, before] of touched) {
      if (!tracker.isEmpty() && (before === null || tracker.max() !== before)) {
        changed.add(tracker);
      }
    }

    let start = result.start;
    let end = result.reconciledEnd;

    for (let i = Math.max(0, result.start - 1); i < result.reconciledEnd && changed.size > 0; i++) {
      const trackers = this.entries[i].trackers;
      for (let col = 0; col < trackers.length; col++) {
        if (changed.delete(trackers[col])) {
          const [runStart, runEnd] = this.extentOf(i, col, trackers[col]);
          start = Math.min(start, runStart);
          end = Math.max(end, runEnd);
        }
      }
    }

    return [start, end];
  }

  // ---------------------------------------------------------------------------
  // Edit Shorthands
  // ---------------------------------------------------------------------------

  /**
   * Insert one line before `index` (`index === length` appends).
   */
  insert(index: number, line: Line<Cell>): EditResult {
    return this.edit(index, index, [line]);
  }

  insertLines(index: number, lines: readonly Line<Cell>[]): EditResult {
    return this.edit(index, index, lines);
  }

  append(line: Line<Cell>): EditResult {
    return this.edit(this.entries.length, this.entries.length, [line]);
  }

  extend(lines: readonly Line<Cell>[]): EditResult {
    return this.edit(this.entries.length, this.entries.length, lines);
  }

  /**
   * Replace one line.
   */
  set(index: number, line: Line<Cell>): EditResult {
    const i = this.resolveIndex(index);
    return this.edit(i, i + 1, [line]);
  }

  delete(index: number): EditResult {
    const i = this.resolveIndex(index);
    return this.edit(i, i + 1, []);
  }

  deleteRange(start: number, end: number): EditResult {
    return this.edit(start, end, []);
  }

  /**
   * Remove a line and return its cells.
   */
  pop(index: number = -1): Line<Cell> {
    const i = this.resolveIndex(index);
    const cells = this.entries[i].cells;
    this.edit(i, i + 1, []);
    return cells;
  }

  /**
   * Delete the first line equal to `line`.
   *
   * @throws LineNotFoundError if no line matches
   */
  remove(line: Line<Cell>): EditResult {
    const index = this.indexOf(line);
    if (index < 0) {
      throw new LineNotFoundError(`No line with ${line.length} matching cells in block of length ${this.entries.length}`);
    }
    return this.edit(index, index + 1, []);
  }

  clear(): EditResult {
    return this.edit(0, this.entries.length, []);
  }

  /**
   * Reverse the line order in place.
   * Runs are contiguous spans, so every tracker stays valid as it is.
   */
  reverse(): void {
    this.entries.reverse();
    if (this.events.hasListeners('reverse')) {
      this.events.emit('reverse', createReverseEvent(this.entries.length));
    }
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  /**
   * Subscribe to block events.
   * @returns Unsubscribe function
   */
  on<K extends keyof TextBlockEventMap>(
    type: K,
    handler: EventHandler<TextBlockEventMap[K]>
  ): Unsubscribe {
    return this.events.addEventListener(type, handler);
  }

  off<K extends keyof TextBlockEventMap>(
    type: K,
    handler: EventHandler<TextBlockEventMap[K]>
  ): void {
    this.events.removeEventListener(type, handler);
  }

  // ---------------------------------------------------------------------------
  // Index Helpers
  // ---------------------------------------------------------------------------

  private resolveRange(start: number, end: number): [number, number] {
    const length = this.entries.length;
    const from = start < 0 ? start + length : start;
    const to = end < 0 ? end + length : end;

    if (!Number.isInteger(from) || !Number.isInteger(to) || from < 0 || to > length || from > to) {
      throw new LineRangeError(from, to, length);
    }
    return [from, to];
  }

  private resolveIndex(index: number): number {
    const length = this.entries.length;
    const i = index < 0 ? index + length : index;

    if (!Number.isInteger(i) || i < 0 || i >= length) {
      throw new LineRangeError(i, i + 1, length, `Line ${index} out of range for block of length ${length}`);
    }
    return i;
  }

  private trackerAt(line: number, column: number): ColumnWidthMultiset {
    const index = this.resolveIndex(line);
    const trackers = this.entries[index].trackers;

    if (!Number.isInteger(column) || column < 0 || column >= trackers.length) {
      throw new LineRangeError(
        index,
        index + 1,
        this.entries.length,
        `Column ${column} out of range for line ${index} with ${trackers.length} columns`
      );
    }
    return trackers[column];
  }

  private extentOf(index: number, column: number, tracker: ColumnWidthMultiset): [number, number] {
    let start = index;
    while (start > 0 && this.entries[start - 1].trackers[column] === tracker) {
      start--;
    }
    let end = index + 1;
    while (end < this.entries.length && this.entries[end].trackers[column] === tracker) {
      end++;
    }
    return [start, end];
  }
}
