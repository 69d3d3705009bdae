export interface OCRConfig {
  confidenceThreshold: number;
  languages: string;
}

/**
 * One row as returned by the OCR engine. Engines emit noise rows
 * (empty text, structural regions), so every field is optional here.
 */
export interface OCRDetection {
  text?: unknown;
  left?: unknown;
  top?: unknown;
  width?: unknown;
  height?: unknown;
  confidence?: unknown;
}

export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface RecognizedWord extends BoundingBox {
  kind: 'word';
  text: string;
  confidence: number;
}

// Block/paragraph/line container rows reported with confidence -1.
export interface StructuralRegion extends BoundingBox {
  kind: 'structural';
}

export type Word = RecognizedWord | StructuralRegion;

export interface PageImage {
  data: Uint8Array;
  widthPx: number;
  heightPx: number;
  dpi: number;
}

export interface OCREngine {
  recognize(image: PageImage, languages: string): Promise<OCRDetection[]>;
}

export interface OCRPageResult {
  pageNumber: number;
  detections: OCRDetection[];
  processingTime: number;
  failed: boolean;
}
