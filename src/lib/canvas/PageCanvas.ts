import type { Style } from '../style/Style';
import type { RGB } from '../style/color';
import type { Size, TextAlignment } from '../types';

/**
 * Reference to an already-rendered raster: a file path, a data URL or the
 * encoded bytes themselves. The engine never looks inside it.
 */
export type ImageSource = string | Uint8Array;

export interface TextOptions {
  /** How `x` anchors the text: left edge, centre or right edge. */
  align?: TextAlignment;
}

export interface LineOptions {
  color?: RGB;
  thickness?: number;
}

export interface RectOptions {
  fill?: RGB;
  stroke?: RGB;
  lineWidth?: number;
}

/**
 * Drawing surface the layout engine places content on.
 *
 * Coordinates are PDF points with the origin at the bottom-left corner of
 * the page. Text is drawn with the style last passed to `setStyle`; a new
 * page starts with no style, so callers must set one after `beginPage`.
 */
export interface PageCanvas<TArtifact = unknown> {
  readonly pageSize: Size;
  /** Number of pages begun so far. */
  readonly pageCount: number;
  readonly currentStyle: Style | null;
  readonly hasOpenPage: boolean;

  beginPage(): void;
  setStyle(style: Style): void;
  drawText(text: string, x: number, y: number, options?: TextOptions): void;
  drawImage(source: ImageSource, x: number, y: number, width: number, height: number): void;
  drawLine(x1: number, y1: number, x2: number, y2: number, options?: LineOptions): void;
  drawRect(x: number, y: number, width: number, height: number, options: RectOptions): void;
  /** Finish the current page. It is never drawn on again. */
  endPage(): void;
  /** Release the surface and hand back what was produced. */
  close(): TArtifact;
  /** Release the surface after a failure; nothing it produced is valid. */
  abort(): void;
}

type CanvasState = 'idle' | 'page-open' | 'closed' | 'aborted';

/**
 * Lifecycle bookkeeping shared by canvas backends: page open/closed state,
 * the current style, and guards against drawing outside a page.
 */
export abstract class BaseCanvas<TArtifact> implements PageCanvas<TArtifact> {
  protected readonly _pageSize: Size;
  private _state: CanvasState = 'idle';
  private _pageCount: number = 0;
  private _currentStyle: Style | null = null;

  constructor(pageSize: Size) {
    this._pageSize = { ...pageSize };
  }

  // ============ Backend hooks ============

  protected abstract onBeginPage(pageNumber: number): void;
  protected abstract onDrawText(text: string, x: number, y: number, style: Style, align: TextAlignment): void;
  protected abstract onDrawImage(source: ImageSource, x: number, y: number, width: number, height: number): void;
  protected abstract onDrawLine(x1: number, y1: number, x2: number, y2: number, color: RGB, thickness: number): void;
  protected abstract onDrawRect(x: number, y: number, width: number, height: number, options: RectOptions): void;
  protected abstract onEndPage(pageNumber: number): void;
  protected abstract onClose(): TArtifact;
  protected onAbort(): void {}

  // ============ PageCanvas ============

  get pageSize(): Size {
    return { ...this._pageSize };
  }

  get pageCount(): number {
    return this._pageCount;
  }

  get currentStyle(): Style | null {
    return this._currentStyle;
  }

  get hasOpenPage(): boolean {
    return this._state === 'page-open';
  }

  beginPage(): void {
    this.assertUsable();
    if (this._state === 'page-open') {
      throw new Error(`Page ${this._pageCount} is still open`);
    }
    this._pageCount++;
    this._state = 'page-open';
    this._currentStyle = null;
    this.onBeginPage(this._pageCount);
  }

  setStyle(style: Style): void {
    this.assertPageOpen();
    this._currentStyle = style;
  }

  drawText(text: string, x: number, y: number, options?: TextOptions): void {
    this.assertPageOpen();
    const style = this._currentStyle;
    if (!style) {
      throw new Error(`No style set on page ${this._pageCount} before drawing text`);
    }
    this.onDrawText(text, x, y, style, options?.align ?? 'left');
  }

  drawImage(source: ImageSource, x: number, y: number, width: number, height: number): void {
    this.assertPageOpen();
    this.onDrawImage(source, x, y, width, height);
  }

  drawLine(x1: number, y1: number, x2: number, y2: number, options?: LineOptions): void {
    this.assertPageOpen();
    this.onDrawLine(x1, y1, x2, y2, options?.color ?? { r: 0, g: 0, b: 0 }, options?.thickness ?? 1);
  }

  drawRect(x: number, y: number, width: number, height: number, options: RectOptions): void {
    this.assertPageOpen();
    this.onDrawRect(x, y, width, height, options);
  }

  endPage(): void {
    this.assertPageOpen();
    this.onEndPage(this._pageCount);
    this._state = 'idle';
    this._currentStyle = null;
  }

  close(): TArtifact {
    this.assertUsable();
    if (this._state === 'page-open') {
      throw new Error(`Cannot close the canvas while page ${this._pageCount} is open`);
    }
    this._state = 'closed';
    return this.onClose();
  }

  abort(): void {
    if (this._state === 'closed' || this._state === 'aborted') return;
    this._state = 'aborted';
    this._currentStyle = null;
    this.onAbort();
  }

  private assertUsable(): void {
    if (this._state === 'closed' || this._state === 'aborted') {
      throw new Error(`Canvas is ${this._state}`);
    }
  }

  private assertPageOpen(): void {
    this.assertUsable();
    if (this._state !== 'page-open') {
      throw new Error('No page is open; call beginPage() first');
    }
  }
}
