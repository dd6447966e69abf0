import { open, rename, rm } from 'fs/promises';
import { randomUUID } from 'crypto';
import { basename, dirname, join } from 'path';
import type { FileHandle } from 'fs/promises';
import { EventEmitter } from '../events/EventEmitter';
import { Section } from './Section';
import type { SectionData } from './Section';
import type { BaseBlock } from '../blocks/BaseBlock';
import { ImageBlock } from '../blocks/ImageBlock';
import { LayoutEngine } from '../layout/LayoutEngine';
import type { BlockPlacement, LayoutSource, RenderResult } from '../layout/LayoutEngine';
import { PdfCanvas } from '../canvas/PdfCanvas';
import { loadImages } from '../canvas/ImageLoader';
import type { ImageSource, PageCanvas } from '../canvas/PageCanvas';
import { parseOrThrow, reportDataSchema, resolveLayoutConfig } from '../config/schema';
import type { LayoutConfigInput, ResolvedLayoutConfig, TitlePageConfig } from '../config/schema';
import { CanvasIOError, InvalidConfigurationError, LayoutError } from '../errors';
import type { Theme } from '../style/Theme';
import type { RGB } from '../style/color';
import type { Margin, Size } from '../types';

export interface DocumentEvents {
  'section-added': [section: Section, index: number];
  'sealed': [];
}

export interface DocumentRenderOptions {
  /** Engine to render with, e.g. one with event listeners attached. */
  engine?: LayoutEngine;
}

export interface PdfRenderResult {
  bytes: Uint8Array;
  pageCount: number;
  placements: BlockPlacement[];
}

export interface RenderFileResult {
  path: string;
  pageCount: number;
  byteLength: number;
}

/**
 * Plain-data form of a document, as accepted by `Document.fromData`.
 */
export interface ReportData {
  config: {
    pageSize: Size;
    margins: Margin;
    lineHeight: number;
    footerText: string;
    footerOffset: number;
    continuationText: string;
    continuationOffset: number;
    titleHeight: number;
    startSectionsOnNewPage: boolean;
    theme: Record<string, { fontName: string; fontSize: number; color: RGB }>;
    titlePage?: TitlePageConfig;
    metadata?: {
      title?: string;
      author?: string;
      subject?: string;
      keywords?: string[];
      creator?: string;
      createdAt?: string;
    };
  };
  sections: SectionData[];
}

/**
 * An ordered list of sections plus the page setup to lay them out with.
 *
 * Sections can be added until the first render; after that the document
 * is sealed. Rendering never changes the document, so it can be rendered
 * again with the same result.
 */
export class Document extends EventEmitter<DocumentEvents> implements LayoutSource {
  readonly config: ResolvedLayoutConfig;
  private _sections: Section[] = [];
  private _sealed: boolean = false;

  /**
   * @throws InvalidConfigurationError
   */
  constructor(options: LayoutConfigInput = {}) {
    super();
    this.config = resolveLayoutConfig(options);
  }

  /**
   * Build a document from plain data, e.g. parsed JSON.
   * @throws InvalidConfigurationError listing every problem found
   */
  static fromData(data: unknown): Document {
    const parsed = parseOrThrow(reportDataSchema, data);
    const document = new Document(parsed.config ?? {});
    parsed.sections.forEach((sectionData, index) => {
      const section = Section.fromData(sectionData, {
        lineHeight: document.config.lineHeight,
        path: `sections.${index}.blocks`
      });
      document.addSection(section);
    });
    return document;
  }

  get sections(): readonly Section[] {
    return this._sections;
  }

  get theme(): Theme {
    return this.config.theme;
  }

  get pageSize(): Size {
    return { ...this.config.pageSize };
  }

  get footerText(): string {
    return this.config.footerText;
  }

  get isSealed(): boolean {
    return this._sealed;
  }

  /**
   * Append a section. Every theme role its blocks use must exist.
   *
   * @throws LayoutError if the document has already been rendered
   * @throws InvalidConfigurationError if a block uses an unknown role
   */
  addSection(section: Section): Section;
  addSection(title: string, blocks?: readonly BaseBlock[]): Section;
  addSection(titleOrSection: string | Section, blocks: readonly BaseBlock[] = []): Section {
    if (this._sealed) {
      throw new LayoutError('Cannot add sections to a document that has already been rendered');
    }

    const section = typeof titleOrSection === 'string' ? new Section(titleOrSection, blocks) : titleOrSection;
    const index = this._sections.length;
    const missing = this.theme.missingRoles(section.referencedRoles());
    if (missing.length > 0) {
      throw new InvalidConfigurationError(
        missing.map(role => `sections.${index}: unknown theme role "${role}"`)
      );
    }

    this._sections.push(section);
    this.emit('section-added', section, index);
    return section;
  }

  /**
   * Distinct image sources referenced by the document, in order of use.
   */
  imageSources(): ImageSource[] {
    const sources = new Set<ImageSource>();
    for (const section of this._sections) {
      for (const block of section.blocks) {
        if (block instanceof ImageBlock) {
          sources.add(block.source);
        }
      }
    }
    return Array.from(sources);
  }

  /**
   * Lay the document out onto any canvas. Seals the document.
   */
  render<TArtifact>(canvas: PageCanvas<TArtifact>, options: DocumentRenderOptions = {}): RenderResult<TArtifact> {
    this.seal();
    const engine = options.engine ?? new LayoutEngine();
    return engine.render(this, canvas);
  }

  /**
   * Render to PDF bytes in memory.
   */
  async renderPdf(options: DocumentRenderOptions = {}): Promise<PdfRenderResult> {
    this.seal();
    const images = await loadImages(this.imageSources());
    const canvas = await PdfCanvas.create({
      pageSize: this.config.pageSize,
      images,
      metadata: this.config.metadata
    });

    const result = this.render(canvas, options);
    const bytes = await result.artifact.save();
    return { bytes, pageCount: result.pageCount, placements: result.placements };
  }

  async renderToBytes(options: DocumentRenderOptions = {}): Promise<Uint8Array> {
    const { bytes } = await this.renderPdf(options);
    return bytes;
  }

  /**
   * Render to a PDF file.
   *
   * The PDF is written to a temporary file beside `path` and renamed over
   * it once complete, so a failed render leaves any existing file at `path`
   * untouched. The temporary file is removed on every failure path.
   */
  async renderToFile(path: string, options: DocumentRenderOptions = {}): Promise<RenderFileResult> {
    const tempPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);
    let handle: FileHandle;
    try {
      handle = await open(tempPath, 'wx');
    } catch (error) {
      throw new CanvasIOError(`Failed to open ${path} for writing`, { cause: error, path });
    }

    let closed = false;
    let renamed = false;
    try {
      const result = await this.renderPdf(options);
      try {
        await handle.writeFile(result.bytes);
        closed = true;
        await handle.close();
        await rename(tempPath, path);
      } catch (error) {
        throw new CanvasIOError(`Failed to write ${path}`, { cause: error, path });
      }
      renamed = true;
      return { path, pageCount: result.pageCount, byteLength: result.bytes.length };
    } catch (error) {
      console.error(`[Document] Failed to render ${path}:`, error);
      throw error;
    } finally {
      if (!closed) {
        await handle.close();
      }
      if (!renamed) {
        await rm(tempPath, { force: true });
      }
    }
  }

  toData(): ReportData {
    const { config } = this;
    const data: ReportData = {
      config: {
        pageSize: { ...config.pageSize },
        margins: { ...config.margins },
        lineHeight: config.lineHeight,
        footerText: config.footerText,
        footerOffset: config.footerOffset,
        continuationText: config.continuationText,
        continuationOffset: config.continuationOffset,
        titleHeight: config.titleHeight,
        startSectionsOnNewPage: config.startSectionsOnNewPage,
        theme: config.theme.toData()
      },
      sections: this._sections.map(section => section.toData())
    };
    if (config.titlePage) {
      data.config.titlePage = config.titlePage;
    }
    if (config.metadata) {
      const { createdAt, ...metadata } = config.metadata;
      data.config.metadata = createdAt ? { ...metadata, createdAt: createdAt.toISOString() } : metadata;
    }
    return data;
  }

  private seal(): void {
    if (this._sealed) return;
    this._sealed = true;
    this.emit('sealed');
  }
}
