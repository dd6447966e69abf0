import type { StyleInit } from '../style/Style';
import type { RGB } from '../style/color';
import type { TextAlignment } from '../types';

/**
 * A theme role name or an inline style.
 */
export type StyleData = string | StyleInit;

export interface TextBlockData {
  type: 'text';
  lines: string[];
  style?: StyleData;
  lineHeight?: number;
  x?: number;
  align?: TextAlignment;
}

export interface ImageBlockData {
  type: 'image';
  /** File path or data URL. */
  source: string;
  width: number;
  height: number;
  x?: number;
  align?: TextAlignment;
  caption?: string;
}

export interface TableBlockData {
  type: 'table';
  header?: string[];
  rows: string[][];
  columnWidths: number[];
  rowHeight: number;
  x?: number;
  style?: StyleData;
  headerStyle?: StyleData;
  headerFill?: RGB | string;
  borderColor?: RGB | string;
  striped?: boolean;
}

export interface RuleBlockData {
  type: 'rule';
  thickness?: number;
  color?: RGB | string;
  spacing?: number;
  width?: number;
  x?: number;
}

export interface SpacerBlockData {
  type: 'spacer';
  height: number;
}

export interface PageBreakBlockData {
  type: 'page-break';
}

export type BlockData =
  | TextBlockData
  | ImageBlockData
  | TableBlockData
  | RuleBlockData
  | SpacerBlockData
  | PageBreakBlockData;
