import { BaseBlock, baselineFor, resolveStyle, styleRefFromData, styleRefToData } from './BaseBlock';
import type { DrawContext, StyleRef } from './BaseBlock';
import type { PageCanvas } from '../canvas/PageCanvas';
import type { TextAlignment } from '../types';
import type { TextBlockData } from './types';
import type { Style } from '../style/Style';

export const DEFAULT_LINE_HEIGHT = 15;

export interface TextLinesBlockConfig {
  /** Pre-wrapped lines; the engine does not break them further. */
  lines: string[];
  style?: StyleRef;
  lineHeight?: number;
  /** Anchor x; defaults to the left margin (or the centre/right of the content area). */
  x?: number;
  align?: TextAlignment;
}

/**
 * A run of pre-split text lines drawn in one style. Never split across pages.
 */
export class TextLinesBlock extends BaseBlock {
  readonly lines: readonly string[];
  readonly style: StyleRef;
  readonly lineHeight: number;
  readonly x?: number;
  readonly align: TextAlignment;

  constructor(config: TextLinesBlockConfig) {
    super();
    const lineHeight = config.lineHeight ?? DEFAULT_LINE_HEIGHT;
    if (!Number.isFinite(lineHeight) || lineHeight <= 0) {
      throw new RangeError(`lineHeight must be positive, got ${lineHeight}`);
    }
    this.lines = Object.freeze([...config.lines]);
    this.style = config.style ?? 'body';
    this.lineHeight = lineHeight;
    this.x = config.x;
    this.align = config.align ?? 'left';
  }

  static fromData(data: TextBlockData, defaultLineHeight: number = DEFAULT_LINE_HEIGHT): TextLinesBlock {
    return new TextLinesBlock({
      lines: data.lines,
      style: data.style === undefined ? undefined : styleRefFromData(data.style),
      lineHeight: data.lineHeight ?? defaultLineHeight,
      x: data.x,
      align: data.align
    });
  }

  get blockType(): 'text' {
    return 'text';
  }

  get height(): number {
    return this.lines.length * this.lineHeight;
  }

  referencedRoles(): string[] {
    return typeof this.style === 'string' ? [this.style] : [];
  }

  resolveStyle(context: DrawContext): Style {
    return resolveStyle(this.style, context.theme);
  }

  /**
   * Anchor x for the configured alignment.
   */
  anchorX(context: DrawContext): number {
    if (this.x !== undefined) return this.x;
    switch (this.align) {
      case 'center':
        return context.left + context.contentWidth / 2;
      case 'right':
        return context.left + context.contentWidth;
      default:
        return context.left;
    }
  }

  draw(canvas: PageCanvas, top: number, context: DrawContext): void {
    const style = this.resolveStyle(context);
    const x = this.anchorX(context);
    canvas.setStyle(style);
    this.lines.forEach((line, index) => {
      const slotTop = top - index * this.lineHeight;
      canvas.drawText(line, x, baselineFor(slotTop, this.lineHeight, style.fontSize), { align: this.align });
    });
  }

  toData(): TextBlockData {
    const data: TextBlockData = {
      type: 'text',
      lines: [...this.lines],
      style: styleRefToData(this.style),
      lineHeight: this.lineHeight
    };
    if (this.x !== undefined) data.x = this.x;
    if (this.align !== 'left') data.align = this.align;
    return data;
  }
}
