/**
 * Text helpers at the edge of the library: cutting raw text into cells and
 * turning column widths into absolute tab stop positions.
 */

/**
 * Split one line of text into cells at every delimiter.
 * A line without delimiters is a single cell (no aligned columns).
 */
export function splitCells(text: string, delimiter: string = '\t'): string[] {
  return text.split(delimiter);
}

/**
 * Split text into lines of cells. Accepts LF and CRLF line endings.
 */
export function splitLines(text: string, delimiter: string = '\t'): string[][] {
  return text.split('\n').map(line => {
    const content = line.endsWith('\r') ? line.slice(0, -1) : line;
    return splitCells(content, delimiter);
  });
}

/**
 * Absolute tab stop positions for a line, measured from the line start:
 * each stop is the running sum of the column widths up to it.
 *
 * @example
 * ```typescript
 * tabStopPositions([6, 3]); // [6, 9]
 * ```
 */
export function tabStopPositions(widths: readonly number[]): number[] {
  const positions: number[] = [];
  let offset = 0;
  for (const width of widths) {
    offset += width;
    positions.push(offset);
  }
  return positions;
}
