/**
 * Shared test data
 */
import { TextLinesBlock } from '../../lib/blocks/TextLinesBlock';
import { Document } from '../../lib/core/Document';
import type { LayoutConfigInput } from '../../lib/config/schema';

/** 2x2 RGB PNG, every pixel #E63946. */
export const PNG_BASE64 =
  'iVBORw0KGgoAAAANSUhEUgAAAAIAAAACCAIAAAD91JpzAAAAEElEQVR4nGN4ZukGRAwQCgApmgWVrS5XQgAAAABJRU5ErkJggg==';

export const PNG_DATA_URL = `data:image/png;base64,${PNG_BASE64}`;

export function pngBytes(): Uint8Array {
  return new Uint8Array(Buffer.from(PNG_BASE64, 'base64'));
}

/**
 * Lines "Line 1" .. "Line n".
 */
export function numberedLines(count: number, prefix: string = 'Line'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}`);
}

/**
 * `count` single-line text blocks.
 */
export function singleLineBlocks(count: number, lineHeight: number = 15): TextLinesBlock[] {
  return numberedLines(count).map(line => new TextLinesBlock({ lines: [line], lineHeight }));
}

/**
 * Letter page, 50pt margins all round: 692pt of usable height.
 */
export function letterDocument(options: LayoutConfigInput = {}): Document {
  return new Document({
    pageSize: 'Letter',
    margins: { top: 50, bottom: 50, left: 50, right: 50 },
    footerText: 'Page {page}',
    ...options
  });
}
