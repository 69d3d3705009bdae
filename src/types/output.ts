import type { CanvasDimensions, PlacedTextBlock } from './layout.js';
import type { PageImage } from './ocr.js';
import type { TextBoxFont } from './config.js';

export interface SlidePage {
  pageNumber: number;
  image: PageImage;
  canvas: CanvasDimensions;
  blocks: PlacedTextBlock[];
}

export interface LayoutWriter {
  begin(canvas: CanvasDimensions): void;
  addPage(page: SlidePage): void;
  finish(): Promise<void>;
}

export interface DocumentRenderer {
  render(source: Uint8Array, dpi: number): Promise<PageImage[]>;
}

export interface SlidePicture {
  type: 'picture';
  left: number;
  top: number;
  width: number;
  height: number;
  image: PageImage;
}

export interface SlideTextBox {
  type: 'text';
  left: number;
  top: number;
  width: number;
  height: number;
  text: string;
  font: TextBoxFont;
  alignment: 'left';
  wordWrap: boolean;
  autoSize: false;
  transparent: boolean;
}

export type SlideShape = SlidePicture | SlideTextBox;

export interface Slide {
  index: number;
  shapes: SlideShape[];
}

export interface SlideDeck {
  canvas: CanvasDimensions;
  slides: Slide[];
}

export interface ConversionResult {
  status: 'done' | 'cancelled' | 'empty';
  pageCount: number;
  processedPages: number;
  blockCount: number;
  ocrFailures: number;
  processingTime: number;
}
