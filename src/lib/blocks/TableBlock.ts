import { BaseBlock, baselineFor, resolveStyle, styleRefFromData, styleRefToData } from './BaseBlock';
import type { DrawContext, StyleRef } from './BaseBlock';
import type { PageCanvas } from '../canvas/PageCanvas';
import type { Style } from '../style/Style';
import { toRGB } from '../style/color';
import type { ColorInput, RGB } from '../style/color';
import type { TableBlockData } from './types';

/** Horizontal inset of cell text from the column edge. */
export const CELL_PADDING = 4;

const DEFAULT_HEADER_FILL = '#457B9D';
const DEFAULT_BORDER_COLOR = '#CCCCCC';
const STRIPE_FILL = '#F2F2F2';

export interface TableBlockConfig {
  header?: string[];
  rows: string[][];
  columnWidths: number[];
  rowHeight: number;
  x?: number;
  style?: StyleRef;
  headerStyle?: StyleRef;
  headerFill?: ColorInput;
  borderColor?: ColorInput;
  /** Shade every other data row. */
  striped?: boolean;
}

/**
 * Fixed-width grid of text cells.
 *
 * Unlike the other blocks a table may span pages: each data row is one
 * piece, and the header is repeated on every page the table continues onto.
 */
export class TableBlock extends BaseBlock {
  readonly header?: readonly string[];
  readonly rows: readonly (readonly string[])[];
  readonly columnWidths: readonly number[];
  readonly rowHeight: number;
  readonly x?: number;
  readonly style: StyleRef;
  readonly headerStyle: StyleRef;
  readonly headerFill: RGB;
  readonly borderColor: RGB;
  readonly striped: boolean;

  constructor(config: TableBlockConfig) {
    super();
    if (config.columnWidths.length === 0) {
      throw new RangeError('A table needs at least one column');
    }
    if (config.columnWidths.some(width => !Number.isFinite(width) || width <= 0)) {
      throw new RangeError(`Column widths must be positive, got [${config.columnWidths.join(', ')}]`);
    }
    if (!Number.isFinite(config.rowHeight) || config.rowHeight <= 0) {
      throw new RangeError(`rowHeight must be positive, got ${config.rowHeight}`);
    }
    const columns = config.columnWidths.length;
    if (config.header && config.header.length > columns) {
      throw new RangeError(`Table header has more cells than the ${columns} columns`);
    }
    const wide = config.rows.findIndex(row => row.length > columns);
    if (wide !== -1) {
      throw new RangeError(`Table row ${wide} has more cells than the ${columns} columns`);
    }

    this.header = config.header ? Object.freeze([...config.header]) : undefined;
    this.rows = Object.freeze(config.rows.map(row => Object.freeze([...row])));
    this.columnWidths = Object.freeze([...config.columnWidths]);
    this.rowHeight = config.rowHeight;
    this.x = config.x;
    this.style = config.style ?? 'tableBody';
    this.headerStyle = config.headerStyle ?? 'tableHeader';
    this.headerFill = toRGB(config.headerFill ?? DEFAULT_HEADER_FILL);
    this.borderColor = toRGB(config.borderColor ?? DEFAULT_BORDER_COLOR);
    this.striped = config.striped ?? false;
  }

  static fromData(data: TableBlockData): TableBlock {
    return new TableBlock({
      header: data.header,
      rows: data.rows,
      columnWidths: data.columnWidths,
      rowHeight: data.rowHeight,
      x: data.x,
      style: data.style === undefined ? undefined : styleRefFromData(data.style),
      headerStyle: data.headerStyle === undefined ? undefined : styleRefFromData(data.headerStyle),
      headerFill: data.headerFill,
      borderColor: data.borderColor,
      striped: data.striped
    });
  }

  get blockType(): 'table' {
    return 'table';
  }

  get atomic(): boolean {
    return false;
  }

  get headerHeight(): number {
    return this.header ? this.rowHeight : 0;
  }

  get height(): number {
    return this.rows.length * this.rowHeight + this.headerHeight;
  }

  get pieceCount(): number {
    return this.rows.length;
  }

  pieceHeight(_index: number): number {
    return this.rowHeight;
  }

  get width(): number {
    return this.columnWidths.reduce((sum, width) => sum + width, 0);
  }

  referencedRoles(): string[] {
    const roles: string[] = [];
    if (typeof this.style === 'string') roles.push(this.style);
    if (this.header && typeof this.headerStyle === 'string') roles.push(this.headerStyle);
    return roles;
  }

  left(context: DrawContext): number {
    return this.x ?? context.left;
  }

  /**
   * Draw the header and every row, top edge at `top`.
   */
  draw(canvas: PageCanvas, top: number, context: DrawContext): void {
    this.drawHeader(canvas, top, context);
    this.rows.forEach((_row, rowIndex) => {
      this.drawRow(canvas, rowIndex, top - this.headerHeight - rowIndex * this.rowHeight, context);
    });
  }

  /**
   * Draw the header row with its top edge at `top`. No-op without a header.
   */
  drawHeader(canvas: PageCanvas, top: number, context: DrawContext): void {
    if (!this.header) return;
    const x = this.left(context);
    canvas.drawRect(x, top - this.rowHeight, this.width, this.rowHeight, {
      fill: this.headerFill,
      stroke: this.borderColor,
      lineWidth: 0.5
    });
    this.drawCells(canvas, this.header, top, resolveStyle(this.headerStyle, context.theme), x);
  }

  drawPiece(canvas: PageCanvas, index: number, top: number, context: DrawContext): void {
    this.drawRow(canvas, index, top, context);
  }

  /**
   * Draw data row `rowIndex` with its top edge at `top`.
   */
  drawRow(canvas: PageCanvas, rowIndex: number, top: number, context: DrawContext): void {
    const row = this.rows[rowIndex];
    if (row === undefined) {
      throw new RangeError(`Table has no row ${rowIndex}`);
    }
    const x = this.left(context);
    const bottom = top - this.rowHeight;
    if (this.striped && rowIndex % 2 === 1) {
      canvas.drawRect(x, bottom, this.width, this.rowHeight, { fill: toRGB(STRIPE_FILL) });
    }
    canvas.drawLine(x, bottom, x + this.width, bottom, { color: this.borderColor, thickness: 0.5 });
    this.drawCells(canvas, row, top, resolveStyle(this.style, context.theme), x);
  }

  private drawCells(canvas: PageCanvas, cells: readonly string[], top: number, style: Style, left: number): void {
    canvas.setStyle(style);
    const baseline = baselineFor(top, this.rowHeight, style.fontSize);
    let x = left;
    this.columnWidths.forEach((width, column) => {
      const cell = cells[column];
      if (cell) {
        canvas.drawText(cell, x + CELL_PADDING, baseline);
      }
      x += width;
    });
  }

  toData(): TableBlockData {
    const data: TableBlockData = {
      type: 'table',
      rows: this.rows.map(row => [...row]),
      columnWidths: [...this.columnWidths],
      rowHeight: this.rowHeight,
      style: styleRefToData(this.style),
      headerStyle: styleRefToData(this.headerStyle),
      headerFill: { ...this.headerFill },
      borderColor: { ...this.borderColor },
      striped: this.striped
    };
    if (this.header) data.header = [...this.header];
    if (this.x !== undefined) data.x = this.x;
    return data;
  }
}
