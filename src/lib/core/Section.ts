import type { BaseBlock } from '../blocks/BaseBlock';
import { BlockFactory } from '../blocks/BlockFactory';
import type { BlockFactoryOptions } from '../blocks/BlockFactory';
import type { BlockData } from '../blocks/types';

export interface SectionData {
  title: string;
  blocks: BlockData[];
}

/**
 * A titled run of blocks. The block list is fixed at construction.
 */
export class Section {
  readonly title: string;
  readonly blocks: readonly BaseBlock[];

  constructor(title: string, blocks: readonly BaseBlock[] = []) {
    this.title = title;
    this.blocks = Object.freeze([...blocks]);
    Object.freeze(this);
  }

  static fromData(data: { title: string; blocks: readonly unknown[] }, options: BlockFactoryOptions = {}): Section {
    return new Section(data.title, BlockFactory.createAll(data.blocks, options));
  }

  /**
   * Sum of the block heights, without the title.
   */
  get contentHeight(): number {
    return this.blocks.reduce((sum, block) => sum + block.height, 0);
  }

  get isEmpty(): boolean {
    return this.blocks.length === 0;
  }

  /**
   * Theme roles the blocks of this section draw with.
   */
  referencedRoles(): string[] {
    return Array.from(new Set(this.blocks.flatMap(block => block.referencedRoles())));
  }

  toData(): SectionData {
    return {
      title: this.title,
      blocks: this.blocks.map(block => block.toData())
    };
  }
}
