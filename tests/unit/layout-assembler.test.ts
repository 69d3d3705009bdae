import { describe, it, expect, beforeEach } from 'vitest';
import { LayoutAssembler } from '../../src/core/layout-assembler.js';
import { CancellationSource, CancellationToken } from '../../src/core/cancellation.js';
import { ConfigError } from '../../src/core/errors.js';
import type { LayoutEvent, PageInput } from '../../src/types/layout.js';
import { detection } from '../test-utils.js';

function samplePage(): PageInput {
  return {
    pageNumber: 1,
    geometry: { widthPx: 3000, heightPx: 2250, dpi: 300 },
    detections: [
      detection('Hello', 0, 0, 150, 30, 90),
      detection('World', 150, 0, 150, 30, 80),
      detection('Bye', 300, 600, 150, 30, 70),
      detection('', 10, 10, 10, 10, 99),
      detection('region', 0, 0, 3000, 2250, -1),
      detection('smudge', 900, 900, 10, 10, 12)
    ]
  };
}

describe('LayoutAssembler', () => {
  let assembler: LayoutAssembler;
  let events: LayoutEvent[];

  beforeEach(() => {
    assembler = new LayoutAssembler();
    events = [];
  });

  it('should turn detections into blocks placed in output units', () => {
    const layout = assembler.assemblePage(samplePage());

    expect(layout.cancelled).toBe(false);
    expect(layout.blocks).toEqual([
      { text: 'Hello World', confidence: 85, left: 0, top: 0, width: 914400, height: 91440 },
      { text: 'Bye', confidence: 70, left: 914400, top: 1828800, width: 457200, height: 91440 }
    ]);
  });

  it('should group in page pixels', () => {
    const { wordCount, lineCount, blocks } = assembler.group(samplePage().detections);
    expect(wordCount).toBe(3);
    expect(lineCount).toBe(2);
    expect(blocks.map((b) => b.box)).toEqual([
      { left: 0, top: 0, width: 300, height: 30 },
      { left: 300, top: 600, width: 150, height: 30 }
    ]);
  });

  it('should report each block and the finished page', () => {
    assembler.assemblePage(samplePage(), { onEvent: (e) => events.push(e) });

    expect(events.map((e) => e.type)).toEqual(['block', 'block', 'page']);
    expect(events[2]).toEqual({
      type: 'page',
      pageNumber: 1,
      wordCount: 3,
      lineCount: 2,
      blockCount: 2
    });
  });

  it('should return an empty cancelled layout when cancelled before the page starts', () => {
    const source = new CancellationSource();
    source.cancel();

    const layout = assembler.assemblePage(samplePage(), {
      token: source.token,
      onEvent: (e) => events.push(e)
    });

    expect(layout).toEqual({ pageNumber: 1, blocks: [], cancelled: true });
    expect(events).toEqual([{ type: 'cancelled', pageNumber: 1, placedBlocks: 0 }]);
  });

  it('should stop between blocks once cancellation is requested', () => {
    const source = new CancellationSource();
    const layout = assembler.assemblePage(samplePage(), {
      token: source.token,
      onEvent: (e) => {
        events.push(e);
        if (e.type === 'block') source.cancel();
      }
    });

    expect(layout.cancelled).toBe(true);
    expect(layout.blocks.map((b) => b.text)).toEqual(['Hello World']);
    expect(events.map((e) => e.type)).toEqual(['block', 'cancelled']);
  });

  it('should accept an aborted AbortSignal as a token', () => {
    const controller = new AbortController();
    controller.abort();
    const layout = assembler.assemblePage(samplePage(), {
      token: CancellationToken.fromSignal(controller.signal)
    });
    expect(layout.cancelled).toBe(true);
  });

  it('should produce an empty layout for a page without words', () => {
    const layout = assembler.assemblePage(
      { ...samplePage(), detections: [] },
      { onEvent: (e) => events.push(e) }
    );
    expect(layout).toEqual({ pageNumber: 1, blocks: [], cancelled: false });
    expect(events).toEqual([{ type: 'page', pageNumber: 1, wordCount: 0, lineCount: 0, blockCount: 0 }]);
  });

  it('should convert with the page dpi', () => {
    const page = samplePage();
    const layout = assembler.assemblePage({
      ...page,
      geometry: { widthPx: 1500, heightPx: 1125, dpi: 150 }
    });
    expect(layout.blocks[0]).toMatchObject({ left: 0, top: 0, width: 1828800, height: 182880 });
  });

  it('should apply its configured threshold', () => {
    const strict = new LayoutAssembler({ confidenceThreshold: 75 });
    const layout = strict.assemblePage(samplePage());
    expect(layout.blocks.map((b) => b.text)).toEqual(['Hello World']);
  });

  it('should give identical output for identical input', () => {
    const a = assembler.assemblePage(samplePage());
    const b = new LayoutAssembler().assemblePage(samplePage());
    expect(JSON.stringify(a)).toBe(JSON.stringify(b));
  });

  it('should reject invalid configuration', () => {
    expect(() => new LayoutAssembler({ dpi: 0 })).toThrow(ConfigError);
  });
});
