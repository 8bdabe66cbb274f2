/**
 * Tests for the incremental text block.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TextBlock } from './text-block.ts';
import { createTabStops } from '../core/tab-stops.ts';
import { InvalidSizeError, LineNotFoundError, LineRangeError } from '../../types/errors.ts';

describe('TextBlock', () => {
  let block: TextBlock;

  beforeEach(() => {
    block = new TextBlock([
      ['it', 'is', 'a'],
      ['small', 'world'],
    ]);
  });

  describe('construction', () => {
    it('should create an empty block', () => {
      const empty = new TextBlock();
      expect(empty.length).toBe(0);
      expect(empty.widths()).toEqual([]);
    });

    it('should compute widths of a single line', () => {
      const single = new TextBlock([['Hello', 'world']]);
      expect(single.widths()).toEqual([[6]]);
    });

    it('should compute widths of the initial lines', () => {
      expect(block.length).toBe(2);
      expect(block.widths()).toEqual([[6, 3], [6]]);
    });

    it('should accept a policy and size function', () => {
      const sized = new TextBlock<number>(
        [[3, 0], [9, 0]],
        createTabStops({ margin: 2, minSize: 0, stepSize: 4 }),
        cell => cell
      );
      expect(sized.widths()).toEqual([[14], [14]]);
    });
  });

  describe('reads', () => {
    it('should return lines by index', () => {
      expect(block.line(0)).toEqual(['it', 'is', 'a']);
      expect(block.line(1)).toEqual(['small', 'world']);
    });

    it('should reject negative line indices', () => {
      expect(() => block.line(-1)).toThrow(LineRangeError);
      expect(() => block.line(-1)).toThrow('Line -1 out of range for block of length 2');
    });

    it('should reject out-of-range lines', () => {
      expect(() => block.line(2)).toThrow(LineRangeError);
      expect(() => block.line(-3)).toThrow(LineRangeError);
    });

    it('should slice lines', () => {
      expect(block.lines(0, 1)).toEqual([['it', 'is', 'a']]);
    });

    it('should return widths for a range', () => {
      expect(block.widths(0, 1)).toEqual([[6, 3]]);
      expect(block.widths(1, 2)).toEqual([[6]]);
      expect(block.widths(1, 1)).toEqual([]);
    });

    it('should reject inverted and out-of-range width ranges', () => {
      expect(() => block.widths(1, 0)).toThrow(LineRangeError);
      expect(() => block.widths(0, 3)).toThrow(LineRangeError);
    });

    it('should look up a single tab size', () => {
      expect(block.tabSize(0, 1)).toBe(3);
      expect(block.tabSize(1, 0)).toBe(6);
      expect(() => block.tabSize(1, 1)).toThrow(LineRangeError);
    });

    it('should expose the run extent of a column', () => {
      expect(block.runExtent(1, 0)).toEqual([0, 2]);
      expect(block.runExtent(0, 1)).toEqual([0, 1]);
    });

    it('should share one tracker across a run', () => {
      expect(block.widthTracker(0, 0)).toBe(block.widthTracker(1, 0));
      expect(block.widthTracker(0, 0).values()).toEqual([3, 6]);
    });
  });

  describe('edit shorthands', () => {
    it('should delete a line', () => {
      block.delete(0);
      expect(block.length).toBe(1);
      expect(block.widths()).toEqual([[6]]);
    });

    it('should delete a range', () => {
      block.deleteRange(0, 1);
      expect(block.length).toBe(1);
      expect(block.line(0)).toEqual(['small', 'world']);
    });

    it('should replace a line', () => {
      block.set(1, ['abc', 'def']);
      expect(block.length).toBe(2);
      expect(block.line(1)).toEqual(['abc', 'def']);
      expect(block.widths()).toEqual([[4, 3], [4]]);
    });

    it('should replace a range', () => {
      block.edit(1, 2, [['abc', 'def']]);
      expect(block.widths()).toEqual([[4, 3], [4]]);
    });

    it('should append a line', () => {
      block.append(['abcdef', 'ghi']);
      expect(block.length).toBe(3);
      expect(() => block.line(-1)).toThrow(LineRangeError);
      expect(block.line(2)).toEqual(['abcdef', 'ghi']);
      expect(block.widths()).toEqual([[7, 3], [7], [7]]);
    });

    it('should extend with lines', () => {
      block.extend([['abcdef', 'ghi']]);
      expect(block.length).toBe(3);
      expect(block.widths()).toEqual([[7, 3], [7], [7]]);
    });

    it('should pop the last line', () => {
      expect(block.pop()).toEqual(['small', 'world']);
      expect(block.widths()).toEqual([[3, 3]]);
    });

    it('should find lines by their cells', () => {
      block.append(['small', 'world']);
      expect(block.indexOf(['small', 'world'])).toBe(1);
      expect(block.indexOf(['small', 'world'], 2)).toBe(2);
      expect(block.indexOf(['small'])).toBe(-1);
      expect(block.count(['small', 'world'])).toBe(2);
    });

    it('should remove the first matching line', () => {
      block.remove(['small', 'world']);
      expect(block.lines()).toEqual([['it', 'is', 'a']]);
      expect(block.widths()).toEqual([[3, 3]]);
    });

    it('should reject removing a line that is not present', () => {
      expect(() => block.remove(['missing'])).toThrow(LineNotFoundError);
      expect(() => block.remove(['missing'])).toThrow('No line with 1 matching cells in block of length 2');
      expect(block.length).toBe(2);
    });

    it('should clear the block', () => {
      block.clear();
      expect(block.length).toBe(0);
      expect(block.widths()).toEqual([]);
    });
  });

  describe('run splits and merges', () => {
    it('should split a run when an empty line is inserted', () => {
      block.insert(1, []);
      expect(block.length).toBe(3);
      expect(block.widths()).toEqual([[3, 3], [], [6]]);
      expect(block.widthTracker(0, 0)).not.toBe(block.widthTracker(2, 0));
    });

    it('should split a run with several inserted lines', () => {
      block.insertLines(1, [['abcdef', 'ghi'], ['a'], ['mr', 'pink']]);
      expect(block.length).toBe(5);
      expect(block.widths()).toEqual([[7, 3], [7], [], [6], [6]]);
    });

    it('should leave following runs alone when inserting at the top', () => {
      block.insert(0, []);
      expect(block.length).toBe(3);
      expect(block.widths()).toEqual([[], [6, 3], [6]]);
    });

    it('should merge runs when the separating line is deleted', () => {
      block.insert(1, []);
      block.delete(1);
      expect(block.widths()).toEqual([[6, 3], [6]]);
      expect(block.widthTracker(0, 0)).toBe(block.widthTracker(1, 0));
      expect(block.widthTracker(0, 0).size).toBe(2);
    });

    it('should merge runs when a separating line gains columns', () => {
      block.insert(1, ['x']);
      expect(block.widths()).toEqual([[3, 3], [], [6]]);
      block.set(1, ['abcdefghij', 'x']);
      expect(block.widths()).toEqual([[11, 3], [11], [11]]);
    });

    it('should split a run when a middle line loses its columns', () => {
      const lines = [['ab', 'x'], ['abcdefgh', 'x'], ['abcd', 'x'], ['a', 'x']];
      const tall = new TextBlock(lines);
      expect(tall.widths()).toEqual([[9], [9], [9], [9]]);

      tall.set(1, ['abcdefgh']);
      expect(tall.widths()).toEqual([[3], [], [5], [5]]);
      expect(tall.runExtent(3, 0)).toEqual([2, 4]);
      expect(tall.widthTracker(2, 0).size).toBe(2);
      expect(tall.widthTracker(0, 0).size).toBe(1);
    });

    it('should move the whole lower run onto a tracker opened above', () => {
      const grid = new TextBlock([['a', 'x'], ['a', 'bcdef', 'x'], ['a', 'b', 'x']]);
      expect(grid.widths()).toEqual([[2], [2, 6], [2, 6]]);

      grid.insert(1, ['a', 'bcdefghi', 'x']);
      expect(grid.widths()).toEqual([[2], [2, 9], [2, 9], [2, 9]]);
      expect(grid.runExtent(3, 1)).toEqual([1, 4]);
    });

    it('should restore widths after delete and re-insert', () => {
      const lines = [['a', 'bb', 'x'], ['abcd', 'x'], [], ['abc', 'de', 'f'], ['a', 'b']];
      const doc = new TextBlock(lines);
      const before = doc.widths();

      for (let i = 0; i < lines.length; i++) {
        const removed = doc.pop(i);
        doc.insert(i, removed);
        expect(doc.widths()).toEqual(before);
      }
    });

    it('should keep runs valid after reversing', () => {
      const doc = new TextBlock([['a', 'x'], ['abcd', 'x'], [], ['ab', 'cd', 'x']]);
      doc.reverse();
      expect(doc.line(0)).toEqual(['ab', 'cd', 'x']);
      expect(doc.widths()).toEqual([[3, 3], [], [5], [5]]);
      doc.insert(2, ['abcdefg', 'x']);
      expect(doc.widths()).toEqual([[3, 3], [], [8], [8], [8]]);
    });
  });

  describe('edit', () => {
    it('should report what it touched', () => {
      const result = block.insert(1, []);
      expect(result).toEqual({ start: 1, deleteCount: 0, insertCount: 1, reconciledEnd: 3 });
    });

    it('should stop reconciling at the first unchanged line', () => {
      const doc = new TextBlock([['a', 'x'], ['b', 'x'], ['c', 'x'], ['d', 'x']]);
      const result = doc.set(1, ['bbbb', 'x']);
      expect(result).toEqual({ start: 1, deleteCount: 1, insertCount: 1, reconciledEnd: 3 });
      expect(doc.widths()).toEqual([[5], [5], [5], [5]]);
    });

    it('should resolve negative indices', () => {
      const result = block.edit(-1, 2, [['abcdefghi', 'j']]);
      expect(result.start).toBe(1);
      expect(block.widths()).toEqual([[10, 3], [10]]);
    });

    it('should reject inverted ranges without changing anything', () => {
      expect(() => block.edit(2, 1, [])).toThrow(LineRangeError);
      expect(() => block.edit(0, 5, [])).toThrow(LineRangeError);
      expect(() => block.edit(0.5, 1, [])).toThrow(LineRangeError);
      expect(block.widths()).toEqual([[6, 3], [6]]);
    });

    it('should leave the block untouched when measuring fails', () => {
      const sized = new TextBlock<string>([['ab', 'c'], ['abc', 'd']], createTabStops(), cell =>
        cell === 'bad' ? -1 : cell.length
      );
      expect(() => sized.edit(0, 1, [['bad', 'x']])).toThrow(InvalidSizeError);
      expect(sized.length).toBe(2);
      expect(sized.widths()).toEqual([[4], [4]]);
      expect(sized.widthTracker(0, 0).size).toBe(2);
    });

    it('should detach every tracker when all lines are deleted', () => {
      const tracker = block.widthTracker(0, 0);
      block.clear();
      expect(tracker.isEmpty()).toBe(true);
    });
  });
});
