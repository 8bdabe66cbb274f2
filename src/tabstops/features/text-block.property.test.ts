/**
 * Randomized checks of the incremental text block against the batch
 * computation. Sequences are seeded, so every run sees the same edits.
 */

import { describe, it, expect } from 'vitest';
import { TextBlock } from './text-block.ts';
import { computeTabSizes, measureLine, cellLength } from '../core/batch.ts';
import { createTabStops } from '../core/tab-stops.ts';

/**
 * Small deterministic PRNG (mulberry32).
 */
function createRandom(seed: number): (limit: number) => number {
  let state = seed >>> 0;
  return (limit: number): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    const unit = ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    return Math.floor(unit * limit);
  };
}

function randomLine(random: (limit: number) => number): string[] {
  // Column counts cluster on 0..3 so runs form, split and merge often
  const cells = random(5);
  const line: string[] = [];
  for (let i = 0; i < cells; i++) {
    line.push('x'.repeat(random(12)));
  }
  return line;
}

function randomLines(random: (limit: number) => number, count: number): string[][] {
  const lines: string[][] = [];
  for (let i = 0; i < count; i++) {
    lines.push(randomLine(random));
  }
  return lines;
}

/**
 * Check run sharing directly: for every (line, column) the run extent must
 * be the maximal span of lines with more than `column` columns, and its
 * tracker must hold exactly one contribution per line of that span.
 */
function expectRunsConsistent(block: TextBlock): void {
  const tabStops = block.tabStops;
  const lines = block.lines();

  for (let i = 0; i < lines.length; i++) {
    const columns = Math.max(0, lines[i].length - 1);
    for (let col = 0; col < columns; col++) {
      let start = i;
      while (start > 0 && lines[start - 1].length - 1 > col) start--;
      let end = i + 1;
      while (end < lines.length && lines[end].length - 1 > col) end++;

      expect(block.runExtent(i, col)).toEqual([start, end]);

      const expected = lines
        .slice(start, end)
        .map(line => measureLine(line, tabStops, cellLength)[col])
        .sort((a, b) => a - b);
      const tracker = block.widthTracker(i, col);
      expect(tracker.values()).toEqual(expected);
      expect(tracker.isBalanced()).toBe(true);
    }
  }
}

describe('TextBlock properties', () => {
  const tabStops = createTabStops();

  it('should match the batch computation when built by appends', () => {
    for (let seed = 1; seed <= 20; seed++) {
      const random = createRandom(seed);
      const lines = randomLines(random, 40);
      const block = new TextBlock([], tabStops);

      for (const line of lines) {
        block.edit(block.length, block.length, [line]);
      }

      expect(block.widths()).toEqual(computeTabSizes(lines, tabStops));
    }
  });

  it('should match the batch computation after every random edit', () => {
    for (let seed = 100; seed < 130; seed++) {
      const random = createRandom(seed);
      const block = new TextBlock(randomLines(random, 10), tabStops);

      for (let step = 0; step < 60; step++) {
        const start = random(block.length + 1);
        const end = start + random(Math.min(4, block.length - start + 1));
        const inserted = randomLines(random, random(4));

        block.edit(start, end, inserted);

        expect(block.widths()).toEqual(computeTabSizes(block.lines(), tabStops));
      }

      expectRunsConsistent(block);
    }
  });

  it('should keep every run tracker exact after random edits', () => {
    const random = createRandom(4242);
    const block = new TextBlock(randomLines(random, 25), tabStops);

    for (let step = 0; step < 40; step++) {
      const start = random(block.length + 1);
      const end = start + random(Math.min(3, block.length - start + 1));
      block.edit(start, end, randomLines(random, random(3)));
      expectRunsConsistent(block);
    }
  });

  it('should restore all widths after deleting and re-inserting any line', () => {
    for (let seed = 7; seed < 12; seed++) {
      const random = createRandom(seed);
      const block = new TextBlock(randomLines(random, 30), tabStops);
      const before = block.widths();

      for (let i = 0; i < block.length; i++) {
        const removed = block.pop(i);
        block.insert(i, removed);
        expect(block.widths()).toEqual(before);
      }
    }
  });

  it('should give every line without columns an empty width list', () => {
    const random = createRandom(99);
    const block = new TextBlock(randomLines(random, 50), tabStops);
    const widths = block.widths();

    block.lines().forEach((line, i) => {
      if (line.length <= 1) {
        expect(widths[i]).toEqual([]);
      }
    });
  });
});
