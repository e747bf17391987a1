/**
 * Pure line-packing logic for the typing game
 * Extracted for testability
 */

/** Half-open `[low, high)` range of word indices shown on one display line */
export type LineRange = readonly [low: number, high: number];

/**
 * Pack words into display lines no wider than `maxColumns`.
 *
 * Words are joined by a single space. A line is closed as soon as adding the
 * next word would make it `maxColumns` or longer; the first word of a line is
 * always taken, so an oversized word ends up alone on its own line.
 *
 * @param words - Words in display order
 * @param maxColumns - Width of the display in columns
 * @returns Ranges covering `[0, words.length)` in order
 */
export function divideLines(words: readonly string[], maxColumns: number): LineRange[] {
  const lines: LineRange[] = [];
  let low = 0;

  while (low < words.length) {
    let lineLength = words[low].length;
    let high = low + 1;

    while (high < words.length) {
      const nextLength = lineLength + 1 + words[high].length;
      if (nextLength >= maxColumns) break;
      lineLength = nextLength;
      high++;
    }

    lines.push([low, high]);
    low = high;
  }

  return lines;
}
