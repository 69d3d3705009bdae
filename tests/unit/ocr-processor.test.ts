import { describe, it, expect, vi, afterEach } from 'vitest';
import { OCRProcessor } from '../../src/ocr/ocr-processor.js';
import type { OCRDetection, OCREngine, PageImage } from '../../src/types/ocr.js';
import { detection } from '../test-utils.js';

const page: PageImage = { data: new Uint8Array(0), widthPx: 100, heightPx: 50, dpi: 300 };

describe('OCRProcessor', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should pass the page and languages to the engine', async () => {
    const rows: OCRDetection[] = [detection('hi', 1, 2, 3, 4, 95)];
    const recognize = vi.fn(async (_image: PageImage, _languages: string) => rows);
    const processor = new OCRProcessor({ recognize }, { languages: 'eng' });

    const result = await processor.processPage(page, 3);

    expect(recognize).toHaveBeenCalledWith(page, 'eng');
    expect(result.pageNumber).toBe(3);
    expect(result.detections).toBe(rows);
    expect(result.failed).toBe(false);
  });

  it('should treat an engine failure as a page without words', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const engine: OCREngine = {
      recognize: async () => {
        throw new Error('engine crashed');
      }
    };

    const result = await new OCRProcessor(engine).processPage(page, 1);

    expect(result.detections).toEqual([]);
    expect(result.failed).toBe(true);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should stay silent in quiet mode', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const engine: OCREngine = { recognize: () => Promise.reject(new Error('nope')) };

    await new OCRProcessor(engine, { quiet: true }).processPage(page, 1);

    expect(warn).not.toHaveBeenCalled();
  });

  it('should give up on an engine that exceeds the timeout', async () => {
    const engine: OCREngine = { recognize: () => new Promise<OCRDetection[]>(() => {}) };

    const result = await new OCRProcessor(engine, { timeout: 5, quiet: true }).processPage(page, 2);

    expect(result.failed).toBe(true);
    expect(result.detections).toEqual([]);
  });
});
