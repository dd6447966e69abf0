import { BaseBlock } from './BaseBlock';
import type { DrawContext } from './BaseBlock';
import type { PageCanvas } from '../canvas/PageCanvas';
import { toRGB } from '../style/color';
import type { ColorInput, RGB } from '../style/color';
import type { RuleBlockData } from './types';

export interface RuleBlockConfig {
  thickness?: number;
  color?: ColorInput;
  /** Gap above and below the line. */
  spacing?: number;
  /** Defaults to the full content width. */
  width?: number;
  x?: number;
}

/**
 * Horizontal divider line centred in `spacing` points of room on each side.
 */
export class RuleBlock extends BaseBlock {
  readonly thickness: number;
  readonly color: RGB;
  readonly spacing: number;
  readonly width?: number;
  readonly x?: number;

  constructor(config: RuleBlockConfig = {}) {
    super();
    this.thickness = config.thickness ?? 1;
    this.color = toRGB(config.color ?? '#457B9D');
    this.spacing = config.spacing ?? 10;
    if (this.thickness <= 0 || this.spacing < 0) {
      throw new RangeError(`Invalid rule: thickness ${this.thickness}, spacing ${this.spacing}`);
    }
    this.width = config.width;
    this.x = config.x;
  }

  static fromData(data: RuleBlockData): RuleBlock {
    return new RuleBlock(data);
  }

  get blockType(): 'rule' {
    return 'rule';
  }

  get height(): number {
    return this.spacing * 2;
  }

  draw(canvas: PageCanvas, top: number, context: DrawContext): void {
    const x = this.x ?? context.left;
    const y = top - this.spacing;
    canvas.drawLine(x, y, x + (this.width ?? context.contentWidth), y, {
      color: this.color,
      thickness: this.thickness
    });
  }

  toData(): RuleBlockData {
    const data: RuleBlockData = {
      type: 'rule',
      thickness: this.thickness,
      color: { ...this.color },
      spacing: this.spacing
    };
    if (this.width !== undefined) data.width = this.width;
    if (this.x !== undefined) data.x = this.x;
    return data;
  }
}
