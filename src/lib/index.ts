export * from './types';

export { Document } from './core/Document';
export type {
  DocumentEvents,
  DocumentRenderOptions,
  PdfRenderResult,
  RenderFileResult,
  ReportData
} from './core/Document';
export { Section } from './core/Section';
export type { SectionData } from './core/Section';

export { LayoutEngine } from './layout/LayoutEngine';
export type {
  LayoutSource,
  LayoutEvents,
  BlockPlacement,
  PlacementKind,
  PageReason,
  RenderResult,
  RenderOptions
} from './layout/LayoutEngine';
export { Cursor } from './layout/Cursor';
export type { CursorConfig, PlacementResult } from './layout/Cursor';

export { EventEmitter } from './events/EventEmitter';
export type { EventHandler, EventMap } from './events/EventEmitter';

// Blocks module exports
export {
  BaseBlock,
  TextLinesBlock,
  ImageBlock,
  TableBlock,
  RuleBlock,
  SpacerBlock,
  PageBreakBlock,
  BlockFactory,
  DEFAULT_LINE_HEIGHT,
  CAPTION_LINE_HEIGHT,
  CELL_PADDING
} from './blocks';

export type {
  StyleRef,
  DrawContext,
  BlockBuilder,
  BlockFactoryOptions,
  TextLinesBlockConfig,
  ImageBlockConfig,
  TableBlockConfig,
  RuleBlockConfig,
  BlockData,
  StyleData,
  TextBlockData,
  ImageBlockData,
  TableBlockData,
  RuleBlockData,
  SpacerBlockData,
  PageBreakBlockData
} from './blocks';

// Canvas module exports
export {
  BaseCanvas,
  RecordingCanvas,
  PdfCanvas,
  textOps,
  loadImage,
  loadImages,
  detectImageFormat
} from './canvas';

export type {
  PageCanvas,
  ImageSource,
  TextOptions,
  LineOptions,
  RectOptions,
  DrawOp,
  RecordedPage,
  RecordedDocument,
  PdfCanvasOptions,
  PdfArtifact,
  LoadedImage,
  ImageFormat
} from './canvas';

// Style module exports
export { Style, Theme, REQUIRED_ROLES, parseColor, toRGB, rgbColor, colorsEqual } from './style';
export type { StyleInit, ThemeInit, ThemeRole, RGB, ColorInput } from './style';

export { resolveLayoutConfig, layoutConfigSchema, reportDataSchema } from './config';
export type { LayoutConfigInput, ResolvedLayoutConfig, TitlePageConfig } from './config';

export {
  LayoutError,
  BlockTooLargeError,
  CanvasIOError,
  InvalidConfigurationError
} from './errors';
