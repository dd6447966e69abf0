import { BaseBlock } from './BaseBlock';
import type { PageBreakBlockData } from './types';

/**
 * Forces the following content onto a new page, unless the cursor already
 * sits at the top of a fresh one.
 */
export class PageBreakBlock extends BaseBlock {
  get blockType(): 'page-break' {
    return 'page-break';
  }

  get height(): number {
    return 0;
  }

  draw(): void {}

  toData(): PageBreakBlockData {
    return { type: 'page-break' };
  }
}
