export type PlacementResult =
  | { fits: true; drawY: number }
  | { fits: false };

export interface CursorConfig {
  pageHeight: number;
  topMargin: number;
  bottomMargin: number;
  /** Default line height for callers that advance line by line. */
  lineHeight: number;
}

/**
 * Vertical write position within the usable area of one page.
 *
 * `y` starts at `pageHeight - topMargin` and only moves down until the
 * next `reset()`. It never goes below `bottomMargin`: a request that would
 * cross it is refused and leaves the cursor untouched.
 */
export class Cursor {
  readonly pageHeight: number;
  readonly topMargin: number;
  readonly bottomMargin: number;
  readonly lineHeight: number;
  private _y: number;

  constructor(config: CursorConfig) {
    if (config.pageHeight - config.topMargin - config.bottomMargin <= 0) {
      throw new RangeError(
        `Margins (${config.topMargin} + ${config.bottomMargin}) leave no room on a page ${config.pageHeight} high`
      );
    }
    this.pageHeight = config.pageHeight;
    this.topMargin = config.topMargin;
    this.bottomMargin = config.bottomMargin;
    this.lineHeight = config.lineHeight;
    this._y = this.top;
  }

  get y(): number {
    return this._y;
  }

  /** The y a fresh page starts at. */
  get top(): number {
    return this.pageHeight - this.topMargin;
  }

  get usableHeight(): number {
    return this.top - this.bottomMargin;
  }

  get remaining(): number {
    return this._y - this.bottomMargin;
  }

  get atPageTop(): boolean {
    return this._y === this.top;
  }

  canFit(height: number): boolean {
    return this._y - height >= this.bottomMargin;
  }

  /**
   * Claim `height` points below the cursor.
   * On success `drawY` is the top of the claimed slot.
   */
  advance(height: number): PlacementResult {
    if (!Number.isFinite(height) || height < 0) {
      throw new RangeError(`Cannot advance by ${height}`);
    }
    if (!this.canFit(height)) {
      return { fits: false };
    }
    const drawY = this._y;
    this._y -= height;
    return { fits: true, drawY };
  }

  advanceLines(count: number = 1): PlacementResult {
    return this.advance(count * this.lineHeight);
  }

  reset(): void {
    this._y = this.top;
  }
}
