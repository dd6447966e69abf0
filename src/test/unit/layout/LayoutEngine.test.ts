/**
 * Unit tests for LayoutEngine
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LayoutEngine } from '../../../lib/layout/LayoutEngine';
import type { PageReason } from '../../../lib/layout/LayoutEngine';
import { RecordingCanvas, textOps } from '../../../lib/canvas/RecordingCanvas';
import type { RecordedDocument } from '../../../lib/canvas/RecordingCanvas';
import { TextLinesBlock } from '../../../lib/blocks/TextLinesBlock';
import { TableBlock } from '../../../lib/blocks/TableBlock';
import { SpacerBlock } from '../../../lib/blocks/SpacerBlock';
import { PageBreakBlock } from '../../../lib/blocks/PageBreakBlock';
import { ImageBlock } from '../../../lib/blocks/ImageBlock';
import { BaseBlock } from '../../../lib/blocks/BaseBlock';
import type { DrawContext } from '../../../lib/blocks/BaseBlock';
import type { TextBlockData } from '../../../lib/blocks/types';
import type { PageCanvas } from '../../../lib/canvas/PageCanvas';
import { Style } from '../../../lib/style/Style';
import { Theme } from '../../../lib/style/Theme';
import { BlockTooLargeError, InvalidConfigurationError, LayoutError } from '../../../lib/errors';
import { letterDocument, numberedLines, singleLineBlocks } from '../../helpers/fixtures';

const LETTER = { width: 612, height: 792 };

function footers(recorded: RecordedDocument): string[][] {
  return recorded.pages.map(page =>
    textOps(page).filter(op => op.y === 20 && op.align === 'center').map(op => op.text)
  );
}

function texts(recorded: RecordedDocument, pageIndex: number): string[] {
  return textOps(recorded.pages[pageIndex]).map(op => op.text);
}

/** One text block `height` points tall. */
function filler(height: number): TextLinesBlock {
  return new TextLinesBlock({ lines: ['filler'], lineHeight: height });
}

/** Checklist placed one 20pt item at a time under a repeated 15pt heading. */
class ChecklistBlock extends BaseBlock {
  readonly items: string[];

  constructor(items: string[]) {
    super();
    this.items = items;
  }

  get blockType(): string {
    return 'checklist';
  }

  get atomic(): boolean {
    return false;
  }

  get height(): number {
    return this.headerHeight + this.items.length * 20;
  }

  get headerHeight(): number {
    return 15;
  }

  get pieceCount(): number {
    return this.items.length;
  }

  pieceHeight(): number {
    return 20;
  }

  draw(canvas: PageCanvas, top: number, context: DrawContext): void {
    this.drawHeader(canvas, top, context);
    this.items.forEach((_item, index) => this.drawPiece(canvas, index, top - 15 - index * 20, context));
  }

  drawHeader(canvas: PageCanvas, top: number, context: DrawContext): void {
    canvas.setStyle(context.theme.get('caption'));
    canvas.drawText('Checklist', context.left, top - 15);
  }

  drawPiece(canvas: PageCanvas, index: number, top: number, context: DrawContext): void {
    canvas.setStyle(context.theme.get('body'));
    canvas.drawText(this.items[index], context.left, top - 20);
  }

  toData(): TextBlockData {
    return { type: 'text', lines: [...this.items] };
  }
}

/** Non-atomic block that only knows how to draw itself whole. */
class BannerBlock extends BaseBlock {
  get blockType(): string {
    return 'banner';
  }

  get atomic(): boolean {
    return false;
  }

  get height(): number {
    return 40;
  }

  draw(canvas: PageCanvas, top: number, context: DrawContext): void {
    canvas.setStyle(context.theme.get('title'));
    canvas.drawText('Banner', context.left, top - 30);
  }

  toData(): TextBlockData {
    return { type: 'text', lines: ['Banner'] };
  }
}

describe('LayoutEngine', () => {
  let engine: LayoutEngine;
  let canvas: RecordingCanvas;

  beforeEach(() => {
    engine = new LayoutEngine();
    canvas = new RecordingCanvas(LETTER);
  });

  describe('pagination', () => {
    it('should put content that fits on a single page with a single footer', () => {
      const doc = letterDocument();
      doc.addSection('', singleLineBlocks(10));

      const result = engine.render(doc, canvas);

      expect(result.pageCount).toBe(1);
      expect(footers(result.artifact)).toEqual([['Page 1']]);
      expect(result.placements.map(p => p.y).slice(0, 3)).toEqual([742, 727, 712]);
    });

    it('should flow the 50-line Letter report onto two pages', () => {
      const doc = letterDocument();
      doc.addSection('', singleLineBlocks(50));

      const result = engine.render(doc, canvas);
      const recorded = result.artifact;

      expect(result.pageCount).toBe(2);
      expect(texts(recorded, 0)).toEqual([...numberedLines(46), 'Page 1']);
      expect(texts(recorded, 1)).toEqual(['(continued)', 'Line 47', 'Line 48', 'Line 49', 'Line 50', 'Page 2']);
      expect(result.placements[46]).toEqual({ sectionIndex: 0, blockIndex: 46, kind: 'block', page: 2, y: 742, height: 15 });
    });

    it('should need ceil(total / usable) pages for content one line over a page', () => {
      const doc = letterDocument({ margins: { top: 46, bottom: 46 } });
      doc.addSection('', singleLineBlocks(36, 20));

      const result = engine.render(doc, canvas);

      expect(result.pageCount).toBe(Math.ceil((36 * 20) / 700));
      expect(footers(result.artifact)).toEqual([['Page 1'], ['Page 2']]);
    });

    it('should fit a block exactly as tall as the usable height', () => {
      const doc = letterDocument();
      doc.addSection('', [new TextLinesBlock({ lines: ['a', 'b', 'c', 'd'], lineHeight: 173 })]);

      const result = engine.render(doc, canvas);

      expect(result.pageCount).toBe(1);
      expect(result.placements).toEqual([{ sectionIndex: 0, blockIndex: 0, kind: 'block', page: 1, y: 742, height: 692 }]);
    });

    it('should reject a block one point taller than the usable height', () => {
      const doc = letterDocument();
      doc.addSection('Overview', [filler(693)]);

      let caught: unknown;
      try {
        engine.render(doc, canvas);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(BlockTooLargeError);
      if (caught instanceof BlockTooLargeError) {
        expect(caught.sectionIndex).toBe(0);
        expect(caught.blockIndex).toBe(0);
        expect(caught.blockHeight).toBe(693);
        expect(caught.usableHeight).toBe(692);
        expect(caught.message).toBe(
          'Block 0 in section 0 ("Overview") needs 693pt but a page only has 692pt of usable height'
        );
      }
    });

    it('should abort the canvas when layout fails', () => {
      const doc = letterDocument();
      doc.addSection('', [filler(800)]);

      expect(() => engine.render(doc, canvas)).toThrow(BlockTooLargeError);
      expect(() => canvas.close()).toThrow('Canvas is aborted');
    });

    it('should guard images like any other block', () => {
      const doc = letterDocument();
      doc.addSection('', [new ImageBlock({ source: 'chart.png', width: 500, height: 700 })]);

      expect(() => engine.render(doc, canvas)).toThrow(BlockTooLargeError);
    });

    it('should give the same placements on every render', () => {
      const doc = letterDocument();
      doc.addSection('Summary', singleLineBlocks(30));
      doc.addSection('Details', singleLineBlocks(30));

      const first = engine.render(doc, new RecordingCanvas(LETTER));
      const second = new LayoutEngine().render(doc, new RecordingCanvas(LETTER));

      expect(second.pageCount).toBe(first.pageCount);
      expect(second.placements).toEqual(first.placements);
    });
  });

  describe('section titles', () => {
    it('should draw the title in the heading role and take titleHeight', () => {
      const doc = letterDocument();
      doc.addSection('Summary', singleLineBlocks(1));

      const result = engine.render(doc, canvas);
      const [title] = textOps(result.artifact.pages[0]);

      expect(title).toEqual({ type: 'text', text: 'Summary', x: 50, y: 719, align: 'left', style: doc.theme.get('heading') });
      expect(result.placements).toEqual([
        { sectionIndex: 0, blockIndex: -1, kind: 'title', page: 1, y: 742, height: 30 },
        { sectionIndex: 0, blockIndex: 0, kind: 'block', page: 1, y: 712, height: 15 }
      ]);
    });

    it('should move a title to the next page rather than leave it alone', () => {
      const doc = letterDocument();
      doc.addSection('First', [filler(612)]);
      doc.addSection('Second', [new TextLinesBlock({ lines: ['a', 'b', 'c'] })]);

      const result = engine.render(doc, canvas);

      expect(result.pageCount).toBe(2);
      expect(texts(result.artifact, 1)).toEqual(['Second', 'a', 'b', 'c', 'Page 2']);
    });

    it('should keep a title on the page when it cannot share any page with its block', () => {
      const doc = letterDocument();
      doc.addSection('', [filler(300)]);
      doc.addSection('Big', [filler(680)]);

      const result = engine.render(doc, canvas);
      const [title, block] = result.placements.filter(p => p.sectionIndex === 1);

      expect(result.pageCount).toBe(2);
      expect(title).toEqual({ sectionIndex: 1, blockIndex: -1, kind: 'title', page: 1, y: 442, height: 30 });
      expect(block).toEqual({ sectionIndex: 1, blockIndex: 0, kind: 'block', page: 2, y: 742, height: 680 });
    });

    it('should start sections on a new page when configured', () => {
      const doc = letterDocument({ startSectionsOnNewPage: true });
      doc.addSection('One', singleLineBlocks(1));
      doc.addSection('Two', singleLineBlocks(1));
      const reasons: PageReason[] = [];
      engine.on('page-added', (_page, reason) => reasons.push(reason));

      const result = engine.render(doc, canvas);

      expect(result.pageCount).toBe(2);
      expect(reasons).toEqual(['first', 'section']);
      expect(texts(result.artifact, 1)).toEqual(['Two', 'Line 1', 'Page 2']);
    });
  });

  describe('style continuity', () => {
    it('should re-apply the active style on the continuation page', () => {
      const caption = Theme.defaults().get('caption');
      const courier = new Style({ fontName: 'Courier', fontSize: 12 });
      const doc = letterDocument();
      doc.addSection('Data', [
        new TextLinesBlock({ lines: numberedLines(40), style: 'caption' }),
        new TextLinesBlock({ lines: numberedLines(10), style: courier })
      ]);
      const stylesOnOpen: (Style | null)[] = [];
      engine.on('page-added', () => stylesOnOpen.push(canvas.currentStyle));

      const result = engine.render(doc, canvas);
      const [header, firstResumed] = textOps(result.artifact.pages[1]);

      expect(result.pageCount).toBe(2);
      expect(stylesOnOpen[1]).toEqual(caption);
      expect(header.text).toBe('Data (continued)');
      expect(header.y).toBe(762);
      expect(header.style).toEqual(caption);
      expect(firstResumed.style).toBe(courier);
    });

    it('should draw footers in the footer role', () => {
      const doc = letterDocument();
      doc.addSection('', singleLineBlocks(1));

      const result = engine.render(doc, canvas);
      const ops = textOps(result.artifact.pages[0]);

      expect(ops[ops.length - 1]).toEqual({
        type: 'text',
        text: 'Page 1',
        x: 306,
        y: 20,
        align: 'center',
        style: doc.theme.get('footer')
      });
    });
  });

  describe('tables', () => {
    const table = () => new TableBlock({
      header: ['Country', 'Rate'],
      rows: numberedLines(10, 'Row').map(label => [label, '1.0']),
      columnWidths: [200, 100],
      rowHeight: 20
    });

    it('should repeat the header on the continuation page', () => {
      const doc = letterDocument();
      doc.addSection('', [filler(600), table()]);

      const result = engine.render(doc, canvas);
      const tablePlacements = result.placements.filter(p => p.blockIndex === 1);
      const headers = tablePlacements.filter(p => p.kind === 'header');
      const rowPages = tablePlacements.filter(p => p.kind === 'piece').map(p => p.page);

      expect(result.pageCount).toBe(2);
      expect(headers.map(p => [p.page, p.y])).toEqual([[1, 142], [2, 742]]);
      expect(rowPages).toEqual([1, 1, 1, 2, 2, 2, 2, 2, 2, 2]);
      expect(texts(result.artifact, 1).slice(0, 5)).toEqual(['(continued)', 'Country', 'Rate', 'Row 4', '1.0']);
    });

    it('should not leave a header alone at the bottom of a page', () => {
      const doc = letterDocument();
      doc.addSection('', [filler(680), table()]);

      const result = engine.render(doc, canvas);
      const headers = result.placements.filter(p => p.kind === 'header');

      expect(headers).toHaveLength(1);
      expect(headers[0].page).toBe(2);
      expect(headers[0].y).toBe(742);
    });

    it('should reject a table whose header and first row exceed a page', () => {
      const doc = letterDocument();
      doc.addSection('', [new TableBlock({ header: ['A'], rows: [['1']], columnWidths: [100], rowHeight: 400 })]);

      expect(() => engine.render(doc, canvas)).toThrow(BlockTooLargeError);
    });
  });

  describe('blocks placed piece by piece', () => {
    it('should split any non-atomic block and repeat its header', () => {
      const doc = letterDocument();
      doc.addSection('', [new ChecklistBlock(numberedLines(40, 'Item'))]);

      const result = engine.render(doc, canvas);
      const headers = result.placements.filter(p => p.kind === 'header');
      const secondPage = result.placements.filter(p => p.kind === 'piece' && p.page === 2);

      expect(result.pageCount).toBe(2);
      expect(headers.map(p => [p.page, p.y])).toEqual([[1, 742], [2, 742]]);
      expect(secondPage).toHaveLength(7);
      expect(secondPage[0]).toEqual({ sectionIndex: 0, blockIndex: 0, kind: 'piece', piece: 33, page: 2, y: 727, height: 20 });
      expect(texts(result.artifact, 1).slice(0, 3)).toEqual(['(continued)', 'Checklist', 'Item 34']);
    });

    it('should draw a non-atomic block without pieces as a single piece', () => {
      const doc = letterDocument();
      doc.addSection('', [new BannerBlock()]);

      const result = engine.render(doc, canvas);

      expect(result.placements).toEqual([
        { sectionIndex: 0, blockIndex: 0, kind: 'piece', piece: 0, page: 1, y: 742, height: 40 }
      ]);
      expect(texts(result.artifact, 0)).toEqual(['Banner', 'Page 1']);
    });
  });

  describe('spacers and page breaks', () => {
    it('should drop a spacer that does not fit', () => {
      const doc = letterDocument();
      doc.addSection('', [filler(682), new SpacerBlock(20), filler(10)]);

      const result = engine.render(doc, canvas);

      expect(result.pageCount).toBe(1);
      expect(result.placements.map(p => p.blockIndex)).toEqual([0, 2]);
    });

    it('should break the page on a page break block', () => {
      const doc = letterDocument();
      doc.addSection('', [...singleLineBlocks(1), new PageBreakBlock(), ...singleLineBlocks(1)]);

      const result = engine.render(doc, canvas);

      expect(result.pageCount).toBe(2);
      expect(texts(result.artifact, 1)).toEqual(['(continued)', 'Line 1', 'Page 2']);
    });

    it('should ignore a page break at the top of a page', () => {
      const doc = letterDocument();
      doc.addSection('', [new PageBreakBlock(), ...singleLineBlocks(1)]);

      expect(engine.render(doc, canvas).pageCount).toBe(1);
    });
  });

  describe('decorations', () => {
    it('should fill in the total page count', () => {
      const doc = letterDocument({ footerText: 'Page {page} of {pages}' });
      doc.addSection('', singleLineBlocks(50));

      const result = engine.render(doc, canvas);

      expect(footers(result.artifact)).toEqual([['Page 1 of 2'], ['Page 2 of 2']]);
    });

    it('should lay out the title page first', () => {
      const doc = letterDocument({
        titlePage: {
          lines: [{ text: 'ANALYSIS REPORT', role: 'title' }, { text: 'Global trends' }],
          rule: { offset: 280 }
        }
      });
      doc.addSection('Summary', singleLineBlocks(1));

      const result = engine.render(doc, canvas);
      const cover = result.artifact.pages[0].ops;

      expect(result.pageCount).toBe(2);
      expect(cover).toEqual([
        { type: 'text', text: 'ANALYSIS REPORT', x: 306, y: 692, align: 'center', style: doc.theme.get('title') },
        { type: 'text', text: 'Global trends', x: 306, y: 642, align: 'center', style: doc.theme.get('subtitle') },
        { type: 'line', x1: 50, y1: 512, x2: 562, y2: 512, color: doc.theme.get('heading').color, thickness: 1 },
        { type: 'text', text: 'Page 1', x: 306, y: 20, align: 'center', style: doc.theme.get('footer') }
      ]);
      expect(result.placements[0].page).toBe(2);
    });

    it('should leave the footer out when there is no footer text', () => {
      const doc = letterDocument({ footerText: '' });
      doc.addSection('', singleLineBlocks(1));

      expect(texts(engine.render(doc, canvas).artifact, 0)).toEqual(['Line 1']);
    });
  });

  describe('events', () => {
    it('should report pages, breaks and completion', () => {
      const doc = letterDocument();
      doc.addSection('', singleLineBlocks(50));
      const start = vi.fn();
      const pages = vi.fn();
      const breaks = vi.fn();
      const placed = vi.fn();
      const complete = vi.fn();
      engine.on('layout-start', start);
      engine.on('page-added', pages);
      engine.on('page-break', breaks);
      engine.on('block-placed', placed);
      engine.on('layout-complete', complete);

      engine.render(doc, canvas);

      expect(start).toHaveBeenCalledWith({ sections: 1 });
      expect(pages.mock.calls).toEqual([[1, 'first'], [2, 'overflow']]);
      expect(breaks).toHaveBeenCalledWith({ fromPage: 1, sectionIndex: 0, blockIndex: 46 });
      expect(placed).toHaveBeenCalledTimes(50);
      expect(complete).toHaveBeenCalledWith({ pageCount: 2, placements: 50 });
    });

    it('should emit layout-error before rethrowing', () => {
      const doc = letterDocument();
      doc.addSection('', [filler(700)]);
      const onError = vi.fn();
      engine.on('layout-error', onError);

      expect(() => engine.render(doc, canvas)).toThrow(BlockTooLargeError);
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toBeInstanceOf(BlockTooLargeError);
    });

    it('should not emit events during the page counting pass', () => {
      const doc = letterDocument({ footerText: '{page}/{pages}' });
      doc.addSection('', singleLineBlocks(50));
      const pages = vi.fn();
      engine.on('page-added', pages);

      engine.render(doc, canvas);

      expect(pages).toHaveBeenCalledTimes(2);
    });
  });

  describe('misuse', () => {
    it('should refuse a canvas of a different page size', () => {
      const doc = letterDocument();
      const a4 = new RecordingCanvas({ width: 595.28, height: 841.89 });

      expect(() => engine.render(doc, a4)).toThrow(InvalidConfigurationError);
      expect(() => a4.close()).toThrow('Canvas is aborted');
    });

    it('should refuse to render while already rendering', () => {
      const doc = letterDocument();
      doc.addSection('', singleLineBlocks(1));
      let nested: unknown;
      engine.once('layout-start', () => {
        try {
          engine.render(doc, new RecordingCanvas(LETTER));
        } catch (error) {
          nested = error;
        }
      });

      engine.render(doc, canvas);

      expect(nested).toBeInstanceOf(LayoutError);
      expect(nested instanceof Error ? nested.message : '').toBe(
        'LayoutEngine.render() called while a render is in progress'
      );
    });

    it('should count pages without drawing anything', () => {
      const doc = letterDocument();
      doc.addSection('', singleLineBlocks(100));

      expect(engine.countPages(doc)).toBe(3);
    });
  });
});
