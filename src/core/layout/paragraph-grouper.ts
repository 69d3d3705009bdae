import type { Line } from '../../types/layout.js';
import { lineBottom, lineText, lineTop } from './line-grouper.js';
import { TextBlock } from './text-block.js';

export const DEFAULT_PARAGRAPH_GAP_MULTIPLIER = 1.5;

export type ParagraphGrouperOptions = {
  paragraphGapMultiplier?: number;
};

function averageHeight(line: Line): number {
  return line.words.reduce((sum, w) => sum + w.height, 0) / line.words.length;
}

/**
 * Merges lines into one block: words joined by spaces, lines by '\n'.
 * Confidence is the mean over every word, not a mean of per-line means.
 */
export function mergeLines(lines: readonly Line[]): TextBlock {
  const words = lines.flatMap((line) => line.words);
  if (words.length === 0) {
    throw new Error('Cannot merge an empty set of lines into a text block');
  }

  let left = Infinity;
  let top = Infinity;
  let right = -Infinity;
  let bottom = -Infinity;
  let confidenceSum = 0;

  for (const w of words) {
    left = Math.min(left, w.left);
    top = Math.min(top, w.top);
    right = Math.max(right, w.left + w.width);
    bottom = Math.max(bottom, w.top + w.height);
    confidenceSum += w.confidence;
  }

  return new TextBlock({
    text: lines.map(lineText).join('\n'),
    left,
    top,
    width: right - left,
    height: bottom - top,
    confidence: confidenceSum / words.length
  });
}

/**
 * Splits consecutive lines into paragraphs. A line continues the paragraph
 * when its gap to the previous line is below that line's average word height
 * times the multiplier. Overlapping lines give a negative gap and always merge.
 */
export function groupIntoParagraphs(
  lines: readonly Line[],
  options: ParagraphGrouperOptions = {}
): TextBlock[] {
  const nonEmpty = lines.filter((line) => line.words.length > 0);
  if (nonEmpty.length === 0) return [];
  const multiplier = options.paragraphGapMultiplier ?? DEFAULT_PARAGRAPH_GAP_MULTIPLIER;

  const blocks: TextBlock[] = [];
  let paragraph: Line[] = [nonEmpty[0]];

  for (let i = 1; i < nonEmpty.length; i++) {
    const prev = nonEmpty[i - 1];
    const curr = nonEmpty[i];

    const threshold = averageHeight(prev) * multiplier;
    const gap = lineTop(curr) - lineBottom(prev);

    if (gap < threshold) {
      paragraph.push(curr);
    } else {
      blocks.push(mergeLines(paragraph));
      paragraph = [curr];
    }
  }

  blocks.push(mergeLines(paragraph));
  return blocks;
}
