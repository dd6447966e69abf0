import { BaseCanvas } from './PageCanvas';
import type { ImageSource, RectOptions } from './PageCanvas';
import type { Style } from '../style/Style';
import type { RGB } from '../style/color';
import type { Size, TextAlignment } from '../types';

export type DrawOp =
  | { type: 'text'; text: string; x: number; y: number; align: TextAlignment; style: Style }
  | { type: 'image'; source: ImageSource; x: number; y: number; width: number; height: number }
  | { type: 'line'; x1: number; y1: number; x2: number; y2: number; color: RGB; thickness: number }
  | { type: 'rect'; x: number; y: number; width: number; height: number; fill?: RGB; stroke?: RGB; lineWidth?: number };

export interface RecordedPage {
  number: number;
  ops: DrawOp[];
}

export interface RecordedDocument {
  pageSize: Size;
  pages: RecordedPage[];
}

/**
 * Canvas that keeps every draw call in memory instead of producing a file.
 * Used to count pages ahead of the real render and to inspect layouts.
 */
export class RecordingCanvas extends BaseCanvas<RecordedDocument> {
  private pages: RecordedPage[] = [];
  private current: RecordedPage | null = null;

  constructor(pageSize: Size) {
    super(pageSize);
  }

  protected onBeginPage(pageNumber: number): void {
    this.current = { number: pageNumber, ops: [] };
  }

  protected onDrawText(text: string, x: number, y: number, style: Style, align: TextAlignment): void {
    this.record({ type: 'text', text, x, y, align, style });
  }

  protected onDrawImage(source: ImageSource, x: number, y: number, width: number, height: number): void {
    this.record({ type: 'image', source, x, y, width, height });
  }

  protected onDrawLine(x1: number, y1: number, x2: number, y2: number, color: RGB, thickness: number): void {
    this.record({ type: 'line', x1, y1, x2, y2, color, thickness });
  }

  protected onDrawRect(x: number, y: number, width: number, height: number, options: RectOptions): void {
    this.record({ type: 'rect', x, y, width, height, ...options });
  }

  protected onEndPage(): void {
    if (this.current) {
      this.pages.push(this.current);
      this.current = null;
    }
  }

  protected onClose(): RecordedDocument {
    return { pageSize: this.pageSize, pages: this.pages };
  }

  protected onAbort(): void {
    this.pages = [];
    this.current = null;
  }

  private record(op: DrawOp): void {
    if (this.current) {
      this.current.ops.push(op);
    }
  }
}

/**
 * Text draw calls of one recorded page, in drawing order.
 */
export function textOps(page: RecordedPage): Extract<DrawOp, { type: 'text' }>[] {
  return page.ops.filter((op): op is Extract<DrawOp, { type: 'text' }> => op.type === 'text');
}
