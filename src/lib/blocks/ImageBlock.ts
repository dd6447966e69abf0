import { BaseBlock, baselineFor } from './BaseBlock';
import type { DrawContext } from './BaseBlock';
import type { ImageSource, PageCanvas } from '../canvas/PageCanvas';
import { detectImageFormat } from '../canvas/ImageLoader';
import type { TextAlignment } from '../types';
import type { ImageBlockData } from './types';

export const CAPTION_LINE_HEIGHT = 15;

export interface ImageBlockConfig {
  source: ImageSource;
  width: number;
  height: number;
  x?: number;
  align?: TextAlignment;
  /** One line drawn centred under the image in the 'caption' role. */
  caption?: string;
}

/**
 * An already-rendered raster placed at a fixed size. The engine takes the
 * caller's dimensions as given and never decodes the image to measure it.
 */
export class ImageBlock extends BaseBlock {
  readonly source: ImageSource;
  readonly width: number;
  readonly imageHeight: number;
  readonly x?: number;
  readonly align: TextAlignment;
  readonly caption?: string;

  constructor(config: ImageBlockConfig) {
    super();
    for (const [name, value] of [['width', config.width], ['height', config.height]] as const) {
      if (!Number.isFinite(value) || value <= 0) {
        throw new RangeError(`Image ${name} must be positive, got ${value}`);
      }
    }
    this.source = config.source;
    this.width = config.width;
    this.imageHeight = config.height;
    this.x = config.x;
    this.align = config.align ?? 'left';
    this.caption = config.caption;
  }

  static fromData(data: ImageBlockData): ImageBlock {
    return new ImageBlock({
      source: data.source,
      width: data.width,
      height: data.height,
      x: data.x,
      align: data.align,
      caption: data.caption
    });
  }

  get blockType(): 'image' {
    return 'image';
  }

  get height(): number {
    return this.imageHeight + (this.caption ? CAPTION_LINE_HEIGHT : 0);
  }

  referencedRoles(): string[] {
    return this.caption ? ['caption'] : [];
  }

  /**
   * Left edge of the image for the configured alignment.
   */
  left(context: DrawContext): number {
    if (this.x !== undefined) return this.x;
    switch (this.align) {
      case 'center':
        return context.left + (context.contentWidth - this.width) / 2;
      case 'right':
        return context.left + context.contentWidth - this.width;
      default:
        return context.left;
    }
  }

  draw(canvas: PageCanvas, top: number, context: DrawContext): void {
    const x = this.left(context);
    canvas.drawImage(this.source, x, top - this.imageHeight, this.width, this.imageHeight);

    if (this.caption) {
      const style = context.theme.get('caption');
      canvas.setStyle(style);
      canvas.drawText(
        this.caption,
        x + this.width / 2,
        baselineFor(top - this.imageHeight, CAPTION_LINE_HEIGHT, style.fontSize),
        { align: 'center' }
      );
    }
  }

  toData(): ImageBlockData {
    const data: ImageBlockData = {
      type: 'image',
      source: typeof this.source === 'string' ? this.source : toDataUrl(this.source),
      width: this.width,
      height: this.imageHeight
    };
    if (this.x !== undefined) data.x = this.x;
    if (this.align !== 'left') data.align = this.align;
    if (this.caption) data.caption = this.caption;
    return data;
  }
}

function toDataUrl(bytes: Uint8Array): string {
  const format = detectImageFormat(bytes);
  const mime = format === 'png' ? 'image/png' : format === 'jpeg' ? 'image/jpeg' : 'application/octet-stream';
  return `data:${mime};base64,${Buffer.from(bytes).toString('base64')}`;
}
