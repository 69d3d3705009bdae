import type { OCRConfig } from './ocr.js';

export interface LayoutConfig extends OCRConfig {
  // Vertical distance (px) from a line's first word within which a word joins that line
  lineMergeThresholdPx: number;
  // Paragraph break when gap >= previous line's mean word height × this value
  paragraphGapMultiplier: number;
  dpi: number;
}

export interface ScanToSlidesConfig {
  layout?: Partial<LayoutConfig>;
  fonts?: Partial<TextBoxFont>;
  debug?: boolean;
}

export interface TextBoxFont {
  name: string;
  fallbackName: string;
  sizePt: number;
}

export interface ConversionProgress {
  stage: 'rendering' | 'ocr' | 'layout' | 'writing' | 'complete' | 'cancelled';
  progress: number;
  currentPage?: number;
  totalPages?: number;
  message?: string;
}

export type ProgressCallback = (progress: ConversionProgress) => void;
