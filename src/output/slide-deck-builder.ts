import type { TextBoxFont } from '../types/config.js';
import type { CanvasDimensions } from '../types/layout.js';
import type { LayoutWriter, Slide, SlideDeck, SlidePage, SlideTextBox } from '../types/output.js';
import { DEFAULT_TEXT_BOX_FONT } from '../core/config.js';

/**
 * In-memory slide deck: a full-bleed picture of the page on each slide with
 * one transparent text box per block on top of it. Serializing the deck to
 * a presentation file is left to the caller.
 */
export class SlideDeckBuilder implements LayoutWriter {
  private deck: SlideDeck | null = null;
  private finished = false;
  private font: TextBoxFont;

  constructor(font: Partial<TextBoxFont> = {}) {
    this.font = { ...DEFAULT_TEXT_BOX_FONT, ...font };
  }

  /** Sets the deck canvas; every slide shares it. */
  begin(canvas: CanvasDimensions): void {
    this.deck = { canvas: { ...canvas }, slides: [] };
    this.finished = false;
  }

  addPage(page: SlidePage): void {
    const deck = this.requireDeck();
    if (this.finished) {
      throw new Error('Slide deck is already finished');
    }

    const slide: Slide = {
      index: deck.slides.length,
      shapes: [
        {
          type: 'picture',
          left: 0,
          top: 0,
          width: deck.canvas.widthUnits,
          height: deck.canvas.heightUnits,
          image: page.image
        },
        ...page.blocks.map((block): SlideTextBox => ({
          type: 'text',
          left: block.left,
          top: block.top,
          width: block.width,
          height: block.height,
          text: block.text,
          font: { ...this.font },
          alignment: 'left',
          wordWrap: true,
          autoSize: false,
          transparent: true
        }))
      ]
    };

    deck.slides.push(slide);
  }

  async finish(): Promise<void> {
    this.requireDeck();
    this.finished = true;
  }

  get slideCount(): number {
    return this.deck ? this.deck.slides.length : 0;
  }

  toDeck(): SlideDeck {
    return this.requireDeck();
  }

  private requireDeck(): SlideDeck {
    if (!this.deck) {
      throw new Error('Slide deck not initialized. Call begin() first.');
    }
    return this.deck;
  }
}
