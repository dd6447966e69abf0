import { EventEmitter } from '../events/EventEmitter';
import { Cursor } from './Cursor';
import type { PlacementResult } from './Cursor';
import { baselineFor } from '../blocks/BaseBlock';
import type { BaseBlock, DrawContext } from '../blocks/BaseBlock';
import { TextLinesBlock } from '../blocks/TextLinesBlock';
import { SpacerBlock } from '../blocks/SpacerBlock';
import { PageBreakBlock } from '../blocks/PageBreakBlock';
import { RecordingCanvas } from '../canvas/RecordingCanvas';
import type { PageCanvas } from '../canvas/PageCanvas';
import type { Section } from '../core/Section';
import type { ResolvedLayoutConfig } from '../config/schema';
import { BlockTooLargeError, InvalidConfigurationError, LayoutError } from '../errors';
import { toRGB } from '../style/color';
import type { Style } from '../style/Style';

/**
 * What the engine lays out: sections in order, and the page geometry,
 * theme and decorations to lay them out with.
 */
export interface LayoutSource {
  readonly sections: readonly Section[];
  readonly config: ResolvedLayoutConfig;
}

export type PlacementKind = 'title' | 'block' | 'header' | 'piece';

/**
 * Where one piece of content ended up. `y` is the top of the slot it took.
 */
export interface BlockPlacement {
  sectionIndex: number;
  /** -1 for the section title. */
  blockIndex: number;
  kind: PlacementKind;
  /** Piece index, e.g. the data row of a table. */
  piece?: number;
  page: number;
  y: number;
  height: number;
}

export type PageReason = 'title-page' | 'first' | 'overflow' | 'section' | 'page-break';

export interface RenderResult<TArtifact> {
  artifact: TArtifact;
  pageCount: number;
  placements: BlockPlacement[];
}

export interface RenderOptions {
  /**
   * Total page count substituted for `{pages}` in the footer. When the
   * footer uses the token and this is not given, the engine counts pages
   * with a dry run first.
   */
  totalPages?: number;
}

export interface LayoutEvents {
  'layout-start': [info: { sections: number }];
  'page-added': [page: number, reason: PageReason];
  'page-break': [info: { fromPage: number; sectionIndex: number; blockIndex: number }];
  'block-placed': [placement: BlockPlacement];
  'layout-complete': [info: { pageCount: number; placements: number }];
  'layout-error': [error: Error];
}

const PAGE_TOKEN = /\{page\}/g;
const PAGES_TOKEN = /\{pages\}/g;
const TITLE_TOKEN = /\{title\}/g;

/**
 * Flows sections of blocks onto pages.
 *
 * The engine itself holds no layout state between calls: each `render`
 * builds a fresh cursor and page counter, so one engine can render any
 * number of documents and rendering the same document twice gives the
 * same placements.
 */
export class LayoutEngine extends EventEmitter<LayoutEvents> {
  private isRendering: boolean = false;

  /**
   * Lay the document out onto `canvas` and close it.
   *
   * On failure the canvas is aborted, `layout-error` is emitted and the
   * error is rethrown.
   *
   * @throws BlockTooLargeError when a block does not fit on an empty page
   */
  render<TArtifact>(source: LayoutSource, canvas: PageCanvas<TArtifact>, options: RenderOptions = {}): RenderResult<TArtifact> {
    if (this.isRendering) {
      throw new LayoutError('LayoutEngine.render() called while a render is in progress');
    }
    this.isRendering = true;

    try {
      let totalPages = options.totalPages;
      if (totalPages === undefined && source.config.footerText.includes('{pages}')) {
        totalPages = this.countPages(source);
      }

      this.emit('layout-start', { sections: source.sections.length });
      const pass = new RenderPass(source, canvas, totalPages ?? null, this);
      const placements = pass.run();
      const artifact = canvas.close();

      this.emit('layout-complete', { pageCount: canvas.pageCount, placements: placements.length });
      return { artifact, pageCount: canvas.pageCount, placements };
    } catch (error) {
      canvas.abort();
      this.emit('layout-error', error instanceof Error ? error : new LayoutError(String(error)));
      throw error;
    } finally {
      this.isRendering = false;
    }
  }

  /**
   * Number of pages the document takes, without producing any output.
   */
  countPages(source: LayoutSource): number {
    const canvas = new RecordingCanvas(source.config.pageSize);
    try {
      new RenderPass(source, canvas, 0, null).run();
    } catch (error) {
      canvas.abort();
      throw error;
    }
    return canvas.pageCount;
  }
}

/**
 * State of one render call: cursor, active style and the placements made
 * so far. Never outlives the call.
 */
class RenderPass<TArtifact> {
  private readonly source: LayoutSource;
  private readonly canvas: PageCanvas<TArtifact>;
  private readonly totalPages: number | null;
  private readonly events: LayoutEngine | null;
  private readonly config: ResolvedLayoutConfig;
  private readonly cursor: Cursor;
  private readonly context: DrawContext;
  private readonly placements: BlockPlacement[] = [];
  private activeStyle: Style;
  private sectionIndex: number = 0;
  private sectionTitle: string = '';

  constructor(
    source: LayoutSource,
    canvas: PageCanvas<TArtifact>,
    totalPages: number | null,
    events: LayoutEngine | null
  ) {
    this.source = source;
    this.canvas = canvas;
    this.totalPages = totalPages;
    this.events = events;
    this.config = source.config;
    const { pageSize, margins, theme } = this.config;

    const canvasSize = canvas.pageSize;
    if (canvasSize.width !== pageSize.width || canvasSize.height !== pageSize.height) {
      throw new InvalidConfigurationError([
        `Canvas pages are ${canvasSize.width}x${canvasSize.height}pt but the document is laid out for ${pageSize.width}x${pageSize.height}pt`
      ]);
    }

    this.cursor = new Cursor({
      pageHeight: pageSize.height,
      topMargin: margins.top,
      bottomMargin: margins.bottom,
      lineHeight: this.config.lineHeight
    });
    this.context = {
      left: margins.left,
      contentWidth: pageSize.width - margins.left - margins.right,
      theme
    };
    this.activeStyle = theme.get('body');
  }

  run(): BlockPlacement[] {
    if (this.config.titlePage) {
      this.drawTitlePage();
    }

    this.openPage('first', false);
    this.source.sections.forEach((section, index) => {
      this.sectionIndex = index;
      this.sectionTitle = section.title;
      this.placeSection(section);
    });
    this.finalizePage();

    return this.placements;
  }

  // ============ Sections ============

  private placeSection(section: Section): void {
    if (this.config.startSectionsOnNewPage && !this.cursor.atPageTop) {
      this.breakPage('section', -1, false);
    }

    if (section.title) {
      this.placeTitle(section);
    }

    section.blocks.forEach((block, blockIndex) => {
      this.placeBlock(block, blockIndex);
    });
  }

  /**
   * Draw the section title, moving it to the next page when it would be
   * left alone at the bottom of this one.
   */
  private placeTitle(section: Section): void {
    const titleHeight = this.config.titleHeight;
    const first = section.blocks[0];
    const keepWith = titleHeight + (first ? first.leadingHeight : 0);

    // Title and block that cannot share any page: only the title has to fit
    const needed = keepWith <= this.cursor.usableHeight ? keepWith : titleHeight;
    if (!this.cursor.canFit(needed) && !this.cursor.atPageTop) {
      this.breakPage('overflow', -1, false);
    }

    const result = this.cursor.advance(titleHeight);
    if (!result.fits) {
      throw this.tooLarge(-1, titleHeight);
    }

    const style = this.context.theme.get('heading');
    this.canvas.setStyle(style);
    this.canvas.drawText(
      section.title,
      this.context.left,
      baselineFor(result.drawY, titleHeight, style.fontSize)
    );
    this.canvas.setStyle(this.activeStyle);
    this.record(-1, 'title', result.drawY, titleHeight);
  }

  // ============ Blocks ============

  private placeBlock(block: BaseBlock, blockIndex: number): void {
    if (block instanceof PageBreakBlock) {
      if (!this.cursor.atPageTop) {
        this.breakPage('page-break', blockIndex, true);
      }
      return;
    }

    if (block instanceof SpacerBlock) {
      // A gap at the bottom of a page is simply dropped
      const result = this.cursor.advance(block.height);
      if (result.fits) {
        this.record(blockIndex, 'block', result.drawY, block.height);
      }
      return;
    }

    if (!block.atomic) {
      this.placePieces(block, blockIndex);
      return;
    }

    const result = this.claim(block.height, blockIndex);
    if (block instanceof TextLinesBlock) {
      this.activeStyle = block.resolveStyle(this.context);
    }
    block.draw(this.canvas, result.drawY, this.context);
    this.canvas.setStyle(this.activeStyle);
    this.record(blockIndex, 'block', result.drawY, block.height);
  }

  /**
   * Pieces go onto the page one at a time. The header has to fit together
   * with the first piece, and is drawn again on every page the block
   * continues onto.
   */
  private placePieces(block: BaseBlock, blockIndex: number): void {
    const leading = block.leadingHeight;
    if (!this.cursor.canFit(leading)) {
      if (this.cursor.atPageTop) {
        throw this.tooLarge(blockIndex, leading);
      }
      this.breakPage('overflow', blockIndex, true);
      if (!this.cursor.canFit(leading)) {
        throw this.tooLarge(blockIndex, leading);
      }
    }

    this.placeHeader(block, blockIndex);
    for (let index = 0; index < block.pieceCount; index++) {
      const height = block.pieceHeight(index);
      let result = this.cursor.advance(height);
      if (!result.fits) {
        this.breakPage('overflow', blockIndex, true);
        this.placeHeader(block, blockIndex);
        result = this.cursor.advance(height);
        if (!result.fits) {
          throw this.tooLarge(blockIndex, block.headerHeight + height);
        }
      }
      block.drawPiece(this.canvas, index, result.drawY, this.context);
      this.record(blockIndex, 'piece', result.drawY, height, index);
    }
    this.canvas.setStyle(this.activeStyle);
  }

  private placeHeader(block: BaseBlock, blockIndex: number): void {
    const height = block.headerHeight;
    if (height === 0) return;
    const result = this.cursor.advance(height);
    if (!result.fits) {
      throw this.tooLarge(blockIndex, block.leadingHeight);
    }
    block.drawHeader(this.canvas, result.drawY, this.context);
    this.record(blockIndex, 'header', result.drawY, height);
  }

  /**
   * Advance for an atomic block, breaking the page once if needed.
   */
  private claim(height: number, blockIndex: number): Extract<PlacementResult, { fits: true }> {
    const result = this.cursor.advance(height);
    if (result.fits) return result;

    if (!this.cursor.atPageTop) {
      this.breakPage('overflow', blockIndex, true);
      const retry = this.cursor.advance(height);
      if (retry.fits) return retry;
    }
    throw this.tooLarge(blockIndex, height);
  }

  // ============ Pages ============

  private breakPage(reason: PageReason, blockIndex: number, continuation: boolean): void {
    const fromPage = this.canvas.pageCount;
    this.finalizePage();
    this.events?.emit('page-break', { fromPage, sectionIndex: this.sectionIndex, blockIndex });
    this.openPage(reason, continuation);
  }

  /**
   * Start a page: reset the cursor, re-apply the active style and, on a
   * page that continues a section, draw the continuation header.
   */
  private openPage(reason: PageReason, continuation: boolean): void {
    this.canvas.beginPage();
    this.cursor.reset();
    this.canvas.setStyle(this.activeStyle);
    this.events?.emit('page-added', this.canvas.pageCount, reason);

    if (continuation && this.config.continuationText) {
      const text = this.config.continuationText.replace(TITLE_TOKEN, this.sectionTitle).trim();
      const { pageSize } = this.config;
      this.canvas.drawText(text, this.context.left, pageSize.height - this.config.continuationOffset);
    }
  }

  /**
   * Draw the footer and end the page. Runs exactly once per page.
   */
  private finalizePage(): void {
    const { footerText, footerOffset, pageSize, theme } = this.config;
    if (footerText) {
      const text = footerText
        .replace(PAGE_TOKEN, String(this.canvas.pageCount))
        .replace(PAGES_TOKEN, this.totalPages === null ? '?' : String(this.totalPages));
      this.canvas.setStyle(theme.get('footer'));
      this.canvas.drawText(text, pageSize.width / 2, footerOffset, { align: 'center' });
    }
    this.canvas.endPage();
  }

  private drawTitlePage(): void {
    const titlePage = this.config.titlePage;
    if (!titlePage) return;
    const { pageSize, margins, theme } = this.config;

    this.canvas.beginPage();
    this.events?.emit('page-added', this.canvas.pageCount, 'title-page');

    titlePage.lines.forEach((line, index) => {
      this.canvas.setStyle(theme.get(line.role));
      this.canvas.drawText(
        line.text,
        pageSize.width / 2,
        pageSize.height - titlePage.top - index * titlePage.spacing,
        { align: 'center' }
      );
    });

    if (titlePage.rule) {
      const y = pageSize.height - titlePage.rule.offset;
      this.canvas.drawLine(margins.left, y, pageSize.width - margins.right, y, {
        color: titlePage.rule.color === undefined ? theme.get('heading').color : toRGB(titlePage.rule.color),
        thickness: titlePage.rule.thickness
      });
    }

    this.finalizePage();
  }

  // ============ Bookkeeping ============

  private record(blockIndex: number, kind: PlacementKind, y: number, height: number, piece?: number): void {
    const placement: BlockPlacement = {
      sectionIndex: this.sectionIndex,
      blockIndex,
      kind,
      page: this.canvas.pageCount,
      y,
      height
    };
    if (piece !== undefined) placement.piece = piece;
    this.placements.push(placement);
    this.events?.emit('block-placed', placement);
  }

  private tooLarge(blockIndex: number, blockHeight: number): BlockTooLargeError {
    return new BlockTooLargeError({
      sectionIndex: this.sectionIndex,
      blockIndex,
      blockHeight,
      usableHeight: this.cursor.usableHeight,
      sectionTitle: this.sectionTitle || undefined
    });
  }
}
