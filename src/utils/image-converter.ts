import { PNG } from 'pngjs';
import type { PageImage } from '../types/ocr.js';
import { DomainError } from '../core/errors.js';

export class ImageConverter {
  /** Wraps a rendered PNG page, reading its pixel size from the image itself. */
  static fromPng(data: Uint8Array, dpi: number): PageImage {
    if (!Number.isFinite(dpi) || dpi <= 0) {
      throw new DomainError(`DPI must be a positive number, got ${dpi}`);
    }

    let png: PNG;
    try {
      png = PNG.sync.read(Buffer.from(data));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to decode PNG page image: ${errorMessage}`);
    }

    return {
      data,
      widthPx: png.width,
      heightPx: png.height,
      dpi
    };
  }

  /** A white page of the given size, encoded as PNG. */
  static blankPage(widthPx: number, heightPx: number, dpi: number): PageImage {
    const png = new PNG({ width: widthPx, height: heightPx });
    png.data.fill(0xff);
    const data = new Uint8Array(PNG.sync.write(png));
    return { data, widthPx, heightPx, dpi };
  }
}
