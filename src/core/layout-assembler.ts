import type { LayoutConfig } from '../types/config.js';
import type { OCRDetection } from '../types/ocr.js';
import type {
  LayoutEventCallback,
  PageInput,
  PageLayout,
  PlacedTextBlock
} from '../types/layout.js';
import { CancellationToken } from './cancellation.js';
import { resolveLayoutConfig } from './config.js';
import { boxToUnits } from './geometry.js';
import { filterWords } from './layout/word-filter.js';
import { groupIntoLines } from './layout/line-grouper.js';
import { groupIntoParagraphs } from './layout/paragraph-grouper.js';
import type { TextBlock } from './layout/text-block.js';

export type AssembleOptions = {
  token?: CancellationToken;
  onEvent?: LayoutEventCallback;
};

export type GroupingResult = {
  wordCount: number;
  lineCount: number;
  blocks: TextBlock[];
};

/**
 * Turns one page's OCR detections into text blocks placed in output units.
 * Holds only its configuration, so one instance can serve any number of pages.
 */
export class LayoutAssembler {
  readonly config: LayoutConfig;

  constructor(config: Partial<LayoutConfig> = {}) {
    this.config = resolveLayoutConfig(config);
  }

  /** Filter → lines → paragraphs, in page pixels. */
  group(detections: readonly OCRDetection[]): GroupingResult {
    const words = filterWords(detections, {
      confidenceThreshold: this.config.confidenceThreshold
    });
    const lines = groupIntoLines(words, {
      lineMergeThresholdPx: this.config.lineMergeThresholdPx
    });
    const blocks = groupIntoParagraphs(lines, {
      paragraphGapMultiplier: this.config.paragraphGapMultiplier
    });
    return { wordCount: words.length, lineCount: lines.length, blocks };
  }

  assemblePage(page: PageInput, options: AssembleOptions = {}): PageLayout {
    const token = options.token ?? CancellationToken.none;
    const emit = options.onEvent ?? (() => {});
    const { pageNumber, geometry } = page;

    if (token.isCancellationRequested) {
      emit({ type: 'cancelled', pageNumber, placedBlocks: 0 });
      return { pageNumber, blocks: [], cancelled: true };
    }

    const { wordCount, lineCount, blocks } = this.group(page.detections);

    const placed: PlacedTextBlock[] = [];
    for (const [index, block] of blocks.entries()) {
      if (token.isCancellationRequested) {
        emit({ type: 'cancelled', pageNumber, placedBlocks: placed.length });
        return { pageNumber, blocks: placed, cancelled: true };
      }

      const unitBlock: PlacedTextBlock = {
        text: block.text,
        confidence: block.confidence,
        ...boxToUnits(block.box, geometry.dpi)
      };
      placed.push(unitBlock);
      emit({ type: 'block', pageNumber, index, block: unitBlock });
    }

    emit({ type: 'page', pageNumber, wordCount, lineCount, blockCount: placed.length });
    return { pageNumber, blocks: placed, cancelled: false };
  }
}
