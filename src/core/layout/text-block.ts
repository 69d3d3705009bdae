import type { BoundingBox } from '../../types/ocr.js';

export type TextBlockInit = BoundingBox & {
  text: string;
  confidence: number;
};

/** A positioned paragraph of OCR text, in page pixels. */
export class TextBlock {
  readonly text: string;
  readonly left: number;
  readonly top: number;
  readonly width: number;
  readonly height: number;
  readonly confidence: number;

  constructor(init: TextBlockInit) {
    this.text = init.text;
    this.left = init.left;
    this.top = init.top;
    this.width = Math.max(0, init.width);
    this.height = Math.max(0, init.height);
    this.confidence = init.confidence;
    Object.freeze(this);
  }

  get right(): number {
    return this.left + this.width;
  }

  get bottom(): number {
    return this.top + this.height;
  }

  get centerX(): number {
    return this.left + Math.floor(this.width / 2);
  }

  get centerY(): number {
    return this.top + Math.floor(this.height / 2);
  }

  get box(): BoundingBox {
    return { left: this.left, top: this.top, width: this.width, height: this.height };
  }

  contains(box: BoundingBox): boolean {
    return (
      box.left >= this.left &&
      box.top >= this.top &&
      box.left + box.width <= this.right &&
      box.top + box.height <= this.bottom
    );
  }
}
