import type { BoundingBox, OCRDetection, RecognizedWord } from './ocr.js';

export type Line = {
  words: RecognizedWord[];
};

export type PageGeometry = {
  widthPx: number;
  heightPx: number;
  dpi: number;
};

export type CanvasDimensions = {
  widthUnits: number;
  heightUnits: number;
};

export type PlacedTextBlock = BoundingBox & {
  text: string;
  confidence: number;
};

export type PageInput = {
  pageNumber: number;
  geometry: PageGeometry;
  detections: OCRDetection[];
};

export type PageLayout = {
  pageNumber: number;
  blocks: PlacedTextBlock[];
  cancelled: boolean;
};

export type LayoutEvent =
  | { type: 'block'; pageNumber: number; index: number; block: PlacedTextBlock }
  | {
      type: 'page';
      pageNumber: number;
      wordCount: number;
      lineCount: number;
      blockCount: number;
    }
  | { type: 'cancelled'; pageNumber: number; placedBlocks: number };

export type LayoutEventCallback = (event: LayoutEvent) => void;
