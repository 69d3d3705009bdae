import type {
  ConversionProgress,
  LayoutConfig,
  ProgressCallback,
  ScanToSlidesConfig,
  TextBoxFont
} from './types/config.js';
import type { LayoutEventCallback, PageGeometry } from './types/layout.js';
import type { OCREngine, PageImage } from './types/ocr.js';
import type { ConversionResult, DocumentRenderer, LayoutWriter } from './types/output.js';
import { CancellationToken } from './core/cancellation.js';
import { ConfigPresets, DEFAULT_TEXT_BOX_FONT, resolveLayoutConfig, type ConfigPreset } from './core/config.js';
import { ConfigError, ConversionError } from './core/errors.js';
import { canvasDimensions } from './core/geometry.js';
import { LayoutAssembler } from './core/layout-assembler.js';
import { OCRProcessor } from './ocr/ocr-processor.js';
import { SlideDeckBuilder } from './output/slide-deck-builder.js';

export interface ScanToSlidesCollaborators {
  renderer: DocumentRenderer;
  ocrEngine: OCREngine;
}

export interface ConvertOptions {
  writer?: LayoutWriter;
  onProgress?: ProgressCallback;
  onLayoutEvent?: LayoutEventCallback;
  token?: CancellationToken;
}

export class ScanToSlides {
  private layout: LayoutConfig;
  private font: TextBoxFont;
  private debugEnabled: boolean;
  private renderer: DocumentRenderer;
  private ocrEngine: OCREngine;

  constructor(
    collaborators: ScanToSlidesCollaborators,
    config: ScanToSlidesConfig = {}
  ) {
    this.renderer = collaborators.renderer;
    this.ocrEngine = collaborators.ocrEngine;
    this.layout = resolveLayoutConfig(config.layout);
    this.font = { ...DEFAULT_TEXT_BOX_FONT, ...config.fonts };
    this.debugEnabled = config.debug === true;
  }

  get config(): Readonly<LayoutConfig> {
    return this.layout;
  }

  setLayout(overrides: Partial<LayoutConfig>): this {
    this.layout = resolveLayoutConfig({ ...this.layout, ...overrides });
    return this;
  }

  setDpi(dpi: number): this {
    return this.setLayout({ dpi });
  }

  setLanguages(languages: string): this {
    return this.setLayout({ languages });
  }

  setFont(font: Partial<TextBoxFont>): this {
    this.font = { ...this.font, ...font };
    return this;
  }

  applyPreset(preset: ConfigPreset): this {
    if (!Object.prototype.hasOwnProperty.call(ConfigPresets, preset)) {
      throw new ConfigError(
        `Unknown preset: ${String(preset)}. Available presets: ${Object.keys(ConfigPresets).join(', ')}`,
        'preset'
      );
    }
    return this.setLayout(ConfigPresets[preset]);
  }

  /** Builds an in-memory deck writer using this converter's font settings. */
  createDeckBuilder(): SlideDeckBuilder {
    return new SlideDeckBuilder(this.font);
  }

  async convert(source: Uint8Array, options: ConvertOptions = {}): Promise<ConversionResult> {
    const startTime = Date.now();
    const token = options.token ?? CancellationToken.none;
    const writer = options.writer ?? this.createDeckBuilder();
    const onProgress = options.onProgress;
    const assembler = new LayoutAssembler(this.layout);
    const ocr = new OCRProcessor(this.ocrEngine, { languages: this.layout.languages });

    const result: ConversionResult = {
      status: 'done',
      pageCount: 0,
      processedPages: 0,
      blockCount: 0,
      ocrFailures: 0,
      processingTime: 0
    };
    const finish = (status: ConversionResult['status']): ConversionResult => {
      result.status = status;
      result.processingTime = Date.now() - startTime;
      return result;
    };

    this.reportProgress(onProgress, {
      stage: 'rendering',
      progress: 0,
      message: `Rendering document at ${this.layout.dpi} dpi...`
    });

    let images: PageImage[];
    try {
      images = await this.renderer.render(source, this.layout.dpi);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ConversionError(`Failed to render document: ${errorMessage}`, 'rendering', error);
    }

    result.pageCount = images.length;
    this.reportProgress(onProgress, {
      stage: 'rendering',
      progress: 100,
      totalPages: images.length,
      message: `Rendered ${images.length} pages`
    });

    if (images.length === 0) {
      this.reportProgress(onProgress, { stage: 'complete', progress: 100, message: 'Document has no pages' });
      return finish('empty');
    }

    if (token.isCancellationRequested) {
      return this.cancelled(onProgress, result, finish);
    }

    // The deck takes its size from the first page, as every slide shares one canvas
    const first = images[0];
    const canvas = canvasDimensions(first.widthPx, first.heightPx, first.dpi);
    this.debug(`canvas ${first.widthPx}x${first.heightPx}px -> ${canvas.widthUnits}x${canvas.heightUnits}`);
    this.write(() => writer.begin(canvas));

    for (const [i, image] of images.entries()) {
      const pageNumber = i + 1;
      if (token.isCancellationRequested) {
        return this.cancelled(onProgress, result, finish, pageNumber);
      }

      this.reportProgress(onProgress, {
        stage: 'ocr',
        progress: Math.round((i / images.length) * 100),
        currentPage: pageNumber,
        totalPages: images.length,
        message: `Processing page ${pageNumber}/${images.length}`
      });

      const ocrResult = await ocr.processPage(image, pageNumber);
      if (ocrResult.failed) result.ocrFailures += 1;

      if (token.isCancellationRequested) {
        return this.cancelled(onProgress, result, finish, pageNumber);
      }

      const geometry: PageGeometry = {
        widthPx: image.widthPx,
        heightPx: image.heightPx,
        dpi: image.dpi
      };
      const page = assembler.assemblePage(
        { pageNumber, geometry, detections: ocrResult.detections },
        { token, onEvent: options.onLayoutEvent }
      );
      if (page.cancelled) {
        return this.cancelled(onProgress, result, finish, pageNumber);
      }
      this.debug(`page ${pageNumber}: ${page.blocks.length} text blocks`);

      this.write(() => writer.addPage({ pageNumber, image, canvas, blocks: page.blocks }));
      result.processedPages += 1;
      result.blockCount += page.blocks.length;

      this.reportProgress(onProgress, {
        stage: 'layout',
        progress: Math.round((pageNumber / images.length) * 100),
        currentPage: pageNumber,
        totalPages: images.length,
        message: `Found ${page.blocks.length} text blocks`
      });
    }

    this.reportProgress(onProgress, { stage: 'writing', progress: 0, message: 'Finishing layout...' });
    try {
      await writer.finish();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ConversionError(`Failed to write layout: ${errorMessage}`, 'writing', error);
    }

    this.reportProgress(onProgress, {
      stage: 'complete',
      progress: 100,
      totalPages: images.length,
      message: `Converted ${result.processedPages} pages`
    });
    return finish('done');
  }

  private cancelled(
    onProgress: ProgressCallback | undefined,
    result: ConversionResult,
    finish: (status: ConversionResult['status']) => ConversionResult,
    pageNumber?: number
  ): ConversionResult {
    this.reportProgress(onProgress, {
      stage: 'cancelled',
      progress: result.pageCount > 0 ? Math.round((result.processedPages / result.pageCount) * 100) : 0,
      currentPage: pageNumber,
      totalPages: result.pageCount,
      message: 'Conversion cancelled'
    });
    return finish('cancelled');
  }

  private write(step: () => void): void {
    try {
      step();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new ConversionError(`Failed to write layout: ${errorMessage}`, 'writing', error);
    }
  }

  private debug(...args: unknown[]): void {
    if (!this.debugEnabled) return;
    console.debug('[scan-to-slides]', ...args);
  }

  private reportProgress(
    callback: ProgressCallback | undefined,
    progress: ConversionProgress
  ): void {
    if (callback) {
      callback(progress);
    }
  }
}

export { LayoutAssembler } from './core/layout-assembler.js';
export type { AssembleOptions, GroupingResult } from './core/layout-assembler.js';
export { CancellationSource, CancellationToken } from './core/cancellation.js';
export {
  ConfigPresets,
  DEFAULT_LAYOUT_CONFIG,
  DEFAULT_TEXT_BOX_FONT,
  resolveLayoutConfig,
  resolvePreset
} from './core/config.js';
export type { ConfigPreset } from './core/config.js';
export { ConfigError, ConversionError, DomainError } from './core/errors.js';
export {
  UNITS_PER_INCH,
  STANDARD_SLIDE_WIDTH_UNITS,
  STANDARD_SLIDE_HEIGHT_UNITS,
  DEFAULT_DPI,
  aspectRatio,
  boxToUnits,
  canvasDimensions,
  pixelsToUnits,
  rescale,
  unitsToPixels
} from './core/geometry.js';
export { filterWords, isKeptWord, toWord } from './core/layout/word-filter.js';
export { groupIntoLines } from './core/layout/line-grouper.js';
export { groupIntoParagraphs, mergeLines } from './core/layout/paragraph-grouper.js';
export { TextBlock } from './core/layout/text-block.js';
export { OCRProcessor } from './ocr/ocr-processor.js';
export type { OCRProcessorOptions } from './ocr/ocr-processor.js';
export { SlideDeckBuilder } from './output/slide-deck-builder.js';
export { ImageConverter } from './utils/image-converter.js';

export * from './types/index.js';
