export { BaseBlock, resolveStyle, baselineFor } from './BaseBlock';
export type { StyleRef, BlockType, DrawContext } from './BaseBlock';
export { TextLinesBlock, DEFAULT_LINE_HEIGHT } from './TextLinesBlock';
export type { TextLinesBlockConfig } from './TextLinesBlock';
export { ImageBlock, CAPTION_LINE_HEIGHT } from './ImageBlock';
export type { ImageBlockConfig } from './ImageBlock';
export { TableBlock, CELL_PADDING } from './TableBlock';
export type { TableBlockConfig } from './TableBlock';
export { RuleBlock } from './RuleBlock';
export type { RuleBlockConfig } from './RuleBlock';
export { SpacerBlock } from './SpacerBlock';
export { PageBreakBlock } from './PageBreakBlock';
export { BlockFactory } from './BlockFactory';
export type { BlockBuilder, BlockFactoryOptions } from './BlockFactory';
export type {
  BlockData,
  StyleData,
  TextBlockData,
  ImageBlockData,
  TableBlockData,
  RuleBlockData,
  SpacerBlockData,
  PageBreakBlockData
} from './types';
