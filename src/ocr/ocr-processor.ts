import type { OCREngine, OCRPageResult, PageImage } from '../types/ocr.js';

export interface OCRProcessorOptions {
  languages?: string;
  timeout?: number;
  quiet?: boolean;
}

/**
 * Calls the OCR engine for one page at a time. An engine failure is reported
 * and treated as a page without words so the document keeps converting.
 */
export class OCRProcessor {
  private engine: OCREngine;
  private options: Required<OCRProcessorOptions>;

  constructor(
    engine: OCREngine,
    options: OCRProcessorOptions = {}
  ) {
    this.engine = engine;
    this.options = {
      languages: 'jpn+eng',
      timeout: 30000,
      quiet: false,
      ...options
    };
  }

  async processPage(
    image: PageImage,
    pageNumber: number
  ): Promise<OCRPageResult> {
    const startTime = Date.now();

    try {
      const detections = await this.withTimeout(
        this.engine.recognize(image, this.options.languages),
        pageNumber
      );
      return {
        pageNumber,
        detections: Array.isArray(detections) ? detections : [],
        processingTime: Date.now() - startTime,
        failed: false
      };
    } catch (error) {
      if (!this.options.quiet) {
        console.warn(`OCR failed on page ${pageNumber}, continuing without text:`, error);
      }
      return {
        pageNumber,
        detections: [],
        processingTime: Date.now() - startTime,
        failed: true
      };
    }
  }

  private async withTimeout<T>(work: Promise<T>, pageNumber: number): Promise<T> {
    const timeout = this.options.timeout;
    if (!(timeout > 0) || !Number.isFinite(timeout)) {
      return work;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`OCR timed out after ${timeout}ms on page ${pageNumber}`)),
        timeout
      );
    });

    try {
      return await Promise.race([work, expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
