import { Style } from '../style/Style';
import type { StyleInit } from '../style/Style';
import type { Theme } from '../style/Theme';
import type { PageCanvas } from '../canvas/PageCanvas';
import type { BlockData } from './types';

/**
 * A concrete style, or the name of a theme role to take it from.
 */
export type StyleRef = Style | string;

export type BlockType = 'text' | 'image' | 'table' | 'rule' | 'spacer' | 'page-break';

/**
 * Page geometry and theme a block is drawn against.
 */
export interface DrawContext {
  /** Left edge of the content area. */
  left: number;
  /** Width between the left and right margins. */
  contentWidth: number;
  theme: Theme;
}

/**
 * Abstract base class for all content blocks.
 *
 * A block knows its height before it is placed; the layout engine never
 * measures anything. Atomic blocks are placed whole through `draw`. Blocks
 * that are not atomic (tables) are placed one piece at a time, with their
 * header drawn again at the top of every page they continue onto.
 */
export abstract class BaseBlock {
  /**
   * Block type identifier, matching the `type` of its serialized data.
   */
  abstract get blockType(): string;

  /**
   * Total height in points.
   */
  abstract get height(): number;

  /**
   * Serialize to plain data for persistence.
   */
  abstract toData(): BlockData;

  /**
   * Draw the whole block with its top edge at `top`.
   */
  abstract draw(canvas: PageCanvas, top: number, context: DrawContext): void;

  /**
   * Whether the block must be placed on a single page.
   */
  get atomic(): boolean {
    return true;
  }

  // ============ Piecewise placement ============

  /**
   * Number of pieces a non-atomic block is placed in.
   */
  get pieceCount(): number {
    return 1;
  }

  pieceHeight(_index: number): number {
    return this.height;
  }

  drawPiece(canvas: PageCanvas, _index: number, top: number, context: DrawContext): void {
    this.draw(canvas, top, context);
  }

  /**
   * Height of the header repeated above the pieces on every page; 0 for none.
   */
  get headerHeight(): number {
    return 0;
  }

  drawHeader(_canvas: PageCanvas, _top: number, _context: DrawContext): void {}

  /**
   * Height that has to fit for the block to start on the current page:
   * the header together with the first piece.
   */
  get leadingHeight(): number {
    return this.headerHeight + (this.pieceCount > 0 ? this.pieceHeight(0) : 0);
  }

  /**
   * Theme roles this block looks styles up from.
   */
  referencedRoles(): string[] {
    return [];
  }
}

/**
 * Resolve a style reference against the theme.
 */
export function resolveStyle(ref: StyleRef, theme: Theme): Style {
  return typeof ref === 'string' ? theme.get(ref) : ref;
}

export function styleRefToData(ref: StyleRef): string | StyleInit {
  return typeof ref === 'string' ? ref : ref.toData();
}

export function styleRefFromData(data: string | StyleInit): StyleRef {
  return typeof data === 'string' ? data : new Style(data);
}

/**
 * Baseline for text sitting in a slot `lineHeight` high whose top is `slotTop`,
 * with the leading split evenly above and below the glyphs.
 */
export function baselineFor(slotTop: number, lineHeight: number, fontSize: number): number {
  return slotTop - lineHeight + Math.max(0, (lineHeight - fontSize) / 2);
}
