/**
 * PdfCanvas - pdf-lib backed drawing surface.
 *
 * pdf-lib draws synchronously once fonts and images are embedded, so the
 * asynchronous work (creating the document, embedding images) happens in
 * `PdfCanvas.create` and serialization happens in `PdfArtifact.save`; every
 * draw call in between is synchronous.
 */

import { PDFDocument, StandardFonts, rgb } from 'pdf-lib';
import type { PDFFont, PDFImage, PDFPage } from 'pdf-lib';
import { BaseCanvas } from './PageCanvas';
import type { ImageSource, RectOptions } from './PageCanvas';
import { describeImageSource } from './ImageLoader';
import type { LoadedImage } from './ImageLoader';
import { alignedX, filterToWinAnsi, getStandardFont, toPdfColor } from './pdf-utils';
import { CanvasIOError } from '../errors';
import type { Style } from '../style/Style';
import type { RGB } from '../style/color';
import type { DocumentMetadata, Size, TextAlignment } from '../types';

export interface PdfCanvasOptions {
  pageSize: Size;
  /** Images the report references, already loaded. */
  images?: LoadedImage[];
  metadata?: DocumentMetadata;
}

/**
 * The finished PDF. Serializing it is the only step that can still fail.
 */
export interface PdfArtifact {
  readonly document: PDFDocument;
  readonly pageCount: number;
  save(): Promise<Uint8Array>;
}

const PLACEHOLDER_FILL = rgb(0.8, 0.8, 0.8);
const PLACEHOLDER_TEXT = rgb(0.4, 0.4, 0.4);
const PLACEHOLDER_FONT_SIZE = 10;

export class PdfCanvas extends BaseCanvas<PdfArtifact> {
  private readonly pdfDoc: PDFDocument;
  private readonly fontCache: Map<StandardFonts, PDFFont> = new Map();
  private readonly images: Map<ImageSource, PDFImage | string>;
  private readonly warnedSources: Set<ImageSource> = new Set();
  private page: PDFPage | null = null;

  private constructor(pdfDoc: PDFDocument, pageSize: Size, images: Map<ImageSource, PDFImage | string>) {
    super(pageSize);
    this.pdfDoc = pdfDoc;
    this.images = images;
  }

  /**
   * Create an empty PDF and embed the given images into it.
   * Images that failed to load are remembered with the reason and drawn as
   * placeholders.
   */
  static async create(options: PdfCanvasOptions): Promise<PdfCanvas> {
    let pdfDoc: PDFDocument;
    try {
      pdfDoc = await PDFDocument.create();
    } catch (error) {
      throw new CanvasIOError('Failed to create PDF document', { cause: error });
    }

    if (options.metadata) {
      applyMetadata(pdfDoc, options.metadata);
    }

    const images = new Map<ImageSource, PDFImage | string>();
    for (const image of options.images ?? []) {
      if (image.status !== 'ok') {
        images.set(image.source, image.reason);
        continue;
      }
      try {
        const embedded = image.format === 'png'
          ? await pdfDoc.embedPng(image.bytes)
          : await pdfDoc.embedJpg(image.bytes);
        images.set(image.source, embedded);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        images.set(image.source, `could not be embedded: ${reason}`);
      }
    }

    return new PdfCanvas(pdfDoc, options.pageSize, images);
  }

  protected onBeginPage(): void {
    this.page = this.pdfDoc.addPage([this._pageSize.width, this._pageSize.height]);
  }

  protected onDrawText(text: string, x: number, y: number, style: Style, align: TextAlignment): void {
    const page = this.requirePage();
    const safeText = filterToWinAnsi(text);
    if (!safeText) return;

    const font = this.getFont(style.fontName);
    const width = font.widthOfTextAtSize(safeText, style.fontSize);
    page.drawText(safeText, {
      x: alignedX(x, width, align),
      y,
      font,
      size: style.fontSize,
      color: toPdfColor(style.color)
    });
  }

  protected onDrawImage(source: ImageSource, x: number, y: number, width: number, height: number): void {
    const page = this.requirePage();
    const image = this.images.get(source);

    if (image !== undefined && typeof image !== 'string') {
      page.drawImage(image, { x, y, width, height });
      return;
    }

    const reason = image ?? 'not loaded before rendering';
    if (!this.warnedSources.has(source)) {
      this.warnedSources.add(source);
      console.warn(`[PdfCanvas] Drawing placeholder for image ${describeImageSource(source)}: ${reason}`);
    }
    this.drawPlaceholder(page, source, x, y, width, height);
  }

  protected onDrawLine(x1: number, y1: number, x2: number, y2: number, color: RGB, thickness: number): void {
    this.requirePage().drawLine({
      start: { x: x1, y: y1 },
      end: { x: x2, y: y2 },
      color: toPdfColor(color),
      thickness
    });
  }

  protected onDrawRect(x: number, y: number, width: number, height: number, options: RectOptions): void {
    this.requirePage().drawRectangle({
      x,
      y,
      width,
      height,
      color: options.fill ? toPdfColor(options.fill) : undefined,
      borderColor: options.stroke ? toPdfColor(options.stroke) : undefined,
      borderWidth: options.stroke ? options.lineWidth ?? 1 : 0
    });
  }

  protected onEndPage(): void {
    this.page = null;
  }

  protected onClose(): PdfArtifact {
    const pdfDoc = this.pdfDoc;
    return {
      document: pdfDoc,
      pageCount: pdfDoc.getPageCount(),
      async save(): Promise<Uint8Array> {
        try {
          return await pdfDoc.save();
        } catch (error) {
          throw new CanvasIOError('Failed to serialize PDF', { cause: error });
        }
      }
    };
  }

  protected onAbort(): void {
    this.page = null;
    this.fontCache.clear();
  }

  private requirePage(): PDFPage {
    if (!this.page) {
      throw new Error('No PDF page is open');
    }
    return this.page;
  }

  private getFont(fontName: string): PDFFont {
    const standardFont = getStandardFont(fontName);
    let font = this.fontCache.get(standardFont);
    if (!font) {
      font = this.pdfDoc.embedStandardFont(standardFont);
      this.fontCache.set(standardFont, font);
    }
    return font;
  }

  /**
   * Grey box with a centred note, in place of an image that is unavailable.
   */
  private drawPlaceholder(page: PDFPage, source: ImageSource, x: number, y: number, width: number, height: number): void {
    page.drawRectangle({ x, y, width, height, color: PLACEHOLDER_FILL });

    const font = this.getFont(StandardFonts.Helvetica);
    const label = filterToWinAnsi(`Image not available: ${describeImageSource(source)}`);
    const labelWidth = font.widthOfTextAtSize(label, PLACEHOLDER_FONT_SIZE);
    page.drawText(label, {
      x: x + (width - labelWidth) / 2,
      y: y + (height - PLACEHOLDER_FONT_SIZE) / 2,
      font,
      size: PLACEHOLDER_FONT_SIZE,
      color: PLACEHOLDER_TEXT
    });
  }
}

function applyMetadata(pdfDoc: PDFDocument, metadata: DocumentMetadata): void {
  if (metadata.title) pdfDoc.setTitle(metadata.title);
  if (metadata.author) pdfDoc.setAuthor(metadata.author);
  if (metadata.subject) pdfDoc.setSubject(metadata.subject);
  if (metadata.keywords?.length) pdfDoc.setKeywords(metadata.keywords);
  if (metadata.creator) pdfDoc.setCreator(metadata.creator);
  if (metadata.createdAt) {
    pdfDoc.setCreationDate(metadata.createdAt);
    pdfDoc.setModificationDate(metadata.createdAt);
  }
}
