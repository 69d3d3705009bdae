import type { RecognizedWord } from '../../types/ocr.js';
import type { Line } from '../../types/layout.js';

export const DEFAULT_LINE_MERGE_THRESHOLD_PX = 10;

export type LineGrouperOptions = {
  lineMergeThresholdPx?: number;
};

const byLeft = (a: RecognizedWord, b: RecognizedWord): number => a.left - b.left;

/**
 * Groups words into text lines by vertical proximity.
 *
 * Words are walked in (top, left) order. A word joins the current line when
 * its `top` is within the threshold of the line's *first* word; otherwise it
 * opens a new line. Words inside a line therefore may drift apart by more
 * than the threshold, which is intended: line boundaries must stay stable.
 */
export function groupIntoLines(
  words: readonly RecognizedWord[],
  options: LineGrouperOptions = {}
): Line[] {
  if (words.length === 0) return [];
  const threshold = options.lineMergeThresholdPx ?? DEFAULT_LINE_MERGE_THRESHOLD_PX;

  const sorted = [...words].sort((a, b) => a.top - b.top || a.left - b.left);

  const lines: Line[] = [];
  let current: RecognizedWord[] = [sorted[0]];
  let anchorTop = sorted[0].top;

  for (const word of sorted.slice(1)) {
    if (Math.abs(word.top - anchorTop) < threshold) {
      current.push(word);
    } else {
      lines.push({ words: current.sort(byLeft) });
      current = [word];
      anchorTop = word.top;
    }
  }

  lines.push({ words: current.sort(byLeft) });
  return lines;
}

export function lineTop(line: Line): number {
  return Math.min(...line.words.map((w) => w.top));
}

export function lineBottom(line: Line): number {
  return Math.max(...line.words.map((w) => w.top + w.height));
}

export function lineText(line: Line): string {
  return line.words.map((w) => w.text).join(' ');
}
