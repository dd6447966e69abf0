import { BaseBlock } from './BaseBlock';
import type { SpacerBlockData } from './types';

/**
 * Empty vertical gap. Dropped instead of carried over when it does not fit
 * before a page break.
 */
export class SpacerBlock extends BaseBlock {
  private readonly gap: number;

  constructor(height: number) {
    super();
    if (!Number.isFinite(height) || height < 0) {
      throw new RangeError(`Spacer height must be non-negative, got ${height}`);
    }
    this.gap = height;
  }

  static fromData(data: SpacerBlockData): SpacerBlock {
    return new SpacerBlock(data.height);
  }

  get blockType(): 'spacer' {
    return 'spacer';
  }

  get height(): number {
    return this.gap;
  }

  draw(): void {}

  toData(): SpacerBlockData {
    return { type: 'spacer', height: this.gap };
  }
}
