import type { BoundingBox } from '../types/ocr.js';
import type { CanvasDimensions } from '../types/layout.js';
import { DomainError } from './errors.js';

/**
 * Output units are English Metric Units, the presentation-format convention.
 * All conversions truncate toward zero, so pixel → unit → pixel is lossy.
 */
export const UNITS_PER_INCH = 914400;

// 10 × 7.5 inch reference slide
export const STANDARD_SLIDE_WIDTH_UNITS = 9144000;
export const STANDARD_SLIDE_HEIGHT_UNITS = 6858000;

export const DEFAULT_DPI = 300;

function assertDpi(dpi: number): void {
  if (!Number.isFinite(dpi) || dpi <= 0) {
    throw new DomainError(`DPI must be a positive number, got ${dpi}`);
  }
}

export function pixelsToUnits(pixels: number, dpi: number = DEFAULT_DPI): number {
  assertDpi(dpi);
  const inches = pixels / dpi;
  return Math.trunc(inches * UNITS_PER_INCH);
}

export function unitsToPixels(units: number, dpi: number = DEFAULT_DPI): number {
  assertDpi(dpi);
  const inches = units / UNITS_PER_INCH;
  return Math.trunc(inches * dpi);
}

/**
 * Output canvas size for a page image. Each axis is converted on its own,
 * which keeps the canvas aspect ratio equal to the image's up to truncation.
 *
 * @example
 * canvasDimensions(3000, 2250, 300) // { widthUnits: 9144000, heightUnits: 6858000 }
 */
export function canvasDimensions(
  imageWidthPx: number,
  imageHeightPx: number,
  dpi: number = DEFAULT_DPI
): CanvasDimensions {
  return {
    widthUnits: pixelsToUnits(imageWidthPx, dpi),
    heightUnits: pixelsToUnits(imageHeightPx, dpi)
  };
}

export function boxToUnits(box: BoundingBox, dpi: number = DEFAULT_DPI): BoundingBox {
  return {
    left: pixelsToUnits(box.left, dpi),
    top: pixelsToUnits(box.top, dpi),
    width: pixelsToUnits(box.width, dpi),
    height: pixelsToUnits(box.height, dpi)
  };
}

/** Moves a pixel box captured at `sourceDpi` onto the pixel grid of `targetDpi`. */
export function rescale(
  box: BoundingBox,
  sourceDpi: number,
  targetDpi: number = DEFAULT_DPI
): BoundingBox {
  assertDpi(sourceDpi);
  assertDpi(targetDpi);
  const scale = targetDpi / sourceDpi;
  return {
    left: Math.trunc(box.left * scale),
    top: Math.trunc(box.top * scale),
    width: Math.trunc(box.width * scale),
    height: Math.trunc(box.height * scale)
  };
}

export function aspectRatio(width: number, height: number): number {
  if (height === 0) {
    throw new DomainError('Height cannot be zero');
  }
  return width / height;
}
